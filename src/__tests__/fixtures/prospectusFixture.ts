import type { Page } from "../../core/entities/document";
import { pageOf, tableLine, textLine, textPage } from "./pageFixtures";

const header = (y: number) =>
  tableLine(
    "Particulars",
    [
      { text: "FY2024", right: 300 },
      { text: "FY2023", right: 400 },
    ],
    { y },
  );

const row = (label: string, latest: string, previous: string, y: number) =>
  tableLine(
    label,
    [
      { text: latest, right: 300 },
      { text: previous, right: 400 },
    ],
    { y },
  );

export const mdaSentences = [
  "Our revenue from operations grew steadily during the last fiscal year.",
  "Demand for specialty chemicals remained strong across export markets.",
  "Raw material costs declined which improved our operating margins.",
  "We expect capacity additions to support growth in the coming years.",
];

export const coverPage = textPage(1, "ACME CHEMICALS LIMITED\nRED HERRING PROSPECTUS");

export const contentsPage = textPage(
  2,
  [
    "Contents",
    "Risk Factors .... 3",
    "Management's Discussion and Analysis .... 4",
    "Financial Statements .... 6",
  ].join("\n"),
);

export const riskPage = textPage(
  3,
  "RISK FACTORS\nInvestors should read this section before deciding to invest.",
);

export const mdaPages = [
  textPage(4, ["MANAGEMENT'S DISCUSSION AND ANALYSIS", ...mdaSentences.slice(0, 2)].join("\n")),
  textPage(5, mdaSentences.slice(2).join("\n")),
];

export const statementPages: Page[] = [
  pageOf(6, [
    textLine("Restated Statement of Profit and Loss", { y: 780 }),
    header(760),
    row("Revenue from operations", "1,200", "1,000", 740),
    row("Profit for the year", "150", "120", 720),
  ]),
  pageOf(7, [
    textLine("Restated Statement of Assets and Liabilities", { y: 780 }),
    header(760),
    row("Total assets", "5,000", "4,000", 740),
    row("Total equity", "2,000", "1,800", 720),
    row("Total liabilities", "3,000", "2,200", 700),
  ]),
];

/** A seven-page prospectus: cover, contents, risk factors, MDA (4-5) and two statements. */
export const prospectusPages: Page[] = [
  coverPage,
  contentsPage,
  riskPage,
  ...mdaPages,
  ...statementPages,
];

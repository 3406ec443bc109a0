import { describe, expect, it } from "vitest";
import { textPage } from "../../__tests__/fixtures/pageFixtures";
import { CompanyNameCollector, companyNameFromFileName } from "./companyName";

describe("CompanyNameCollector", () => {
  it("picks the most frequent issuer name and skips exchange names", () => {
    const collector = new CompanyNameCollector();
    collector.consumePage(
      textPage(
        1,
        [
          "RED HERRING PROSPECTUS",
          "ACME CHEMICALS LIMITED",
          "Proposed listing on BSE Limited and National Stock Exchange of India Limited",
          "The Board of Directors of Acme Chemicals Limited approved the offer.",
        ].join("\n"),
      ),
    );
    collector.consumePage(
      textPage(2, "Acme Chemicals Limited (the “Company”) was incorporated in 1995."),
    );

    expect(collector.best()).toBe("ACME CHEMICALS LIMITED");
  });

  it("breaks ties by length", () => {
    const collector = new CompanyNameCollector();
    collector.consumePage(
      textPage(1, "Issued by Acme Chemicals Private Limited, a unit of Acme Ltd."),
    );

    expect(collector.best()).toBe("Acme Chemicals Private Limited");
  });

  it("ignores pages past the scan window", () => {
    const collector = new CompanyNameCollector(2);
    collector.consumePage(textPage(3, "Zenith Polymers Limited"));

    expect(collector.best()).toBeNull();
  });
});

describe("companyNameFromFileName", () => {
  it("skips upload ids and upper-cases the first name token", () => {
    expect(
      companyNameFromFileName(
        "3f2b8c1e-9a7d-4c2e-8f1a-0b6d5e4c3a21_acme-chemicals_rhp.pdf",
      ),
    ).toBe("ACME CHEMICALS");
    expect(companyNameFromFileName("/uploads/zenith.pdf")).toBe("ZENITH");
    expect(companyNameFromFileName(".pdf")).toBe("UNKNOWN");
  });
});

import { z } from "zod";
import {
  isCanonicalLabel,
  type CanonicalLabel,
  type LabelMatch,
} from "../../core/entities/financial";
import synonymData from "./data/labelSynonyms.json";

const synonymFileSchema = z.object({
  ignoredTerms: z.array(z.string().min(1)),
  synonyms: z.record(z.string(), z.array(z.string().min(1)).min(1)),
});

const LEADING_ENUMERATOR = /^(?:\(?(?:[ivx]{1,4}|[a-h]|\d{1,2})[.)]\s+)+/;
const LEADING_OPERATOR = /^(?:less|add)\s+/;
/** Remainders that make a label a caption: "revenue from operations for the year ended march 31". */
const PERIOD_CAPTION = /^(?:for\s+the\s+(?:\w+\s+)?(?:year|period|months?)\s+end(?:ed|ing)|as\s+(?:at|on|of)\s+(?:\d+|(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*)|(?:year|period)\s+end(?:ed|ing))\b/;

/**
 * Folds a printed row label into the form the synonym table is keyed on:
 * "(a) Profit/(Loss) for the year" becomes "profit for the year".
 */
export const normalizeLabel = (raw: string): string => {
  const folded = raw
    .toLowerCase()
    .replace(/[’‘`']/g, "")
    .trim()
    .replace(LEADING_ENUMERATOR, "")
    .replace(/\([^()]*\)/g, " ")
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9\s]/g, " ")
    .replace(/\s+/g, " ")
    .trim();

  return folded.replace(LEADING_OPERATOR, "").replace(LEADING_ENUMERATOR, "");
};

type SynonymEntry = {
  synonym: string;
  label: CanonicalLabel;
};

/**
 * Closed synonym table. Lookup is exact first, then by the longest synonym that prefixes the label on a word boundary.
 */
export class LabelDictionary {
  private readonly exact = new Map<string, CanonicalLabel>();
  private readonly byLength: SynonymEntry[];

  constructor(
    synonyms: ReadonlyMap<CanonicalLabel, readonly string[]>,
    private readonly ignoredTerms: readonly string[] = [],
  ) {
    const entries: SynonymEntry[] = [];
    for (const [label, values] of synonyms) {
      for (const value of values) {
        const synonym = normalizeLabel(value);
        if (!synonym || this.exact.has(synonym)) {
          continue;
        }
        this.exact.set(synonym, label);
        entries.push({ synonym, label });
      }
    }

    this.byLength = entries.sort(
      (left, right) => right.synonym.length - left.synonym.length,
    );
  }

  /**
   * Builds a dictionary from the JSON layout, rejecting keys outside the canonical vocabulary.
   */
  static fromData(data: unknown): LabelDictionary {
    const parsed = synonymFileSchema.parse(data);
    const synonyms = new Map<CanonicalLabel, readonly string[]>();
    for (const [key, values] of Object.entries(parsed.synonyms)) {
      if (!isCanonicalLabel(key)) {
        throw new Error(`Unknown canonical label in synonym table: ${key}`);
      }
      synonyms.set(key, values);
    }

    return new LabelDictionary(
      synonyms,
      parsed.ignoredTerms.map((term) => normalizeLabel(term)),
    );
  }

  match(raw: string): LabelMatch {
    const normalized = normalizeLabel(raw);
    if (!normalized || this.isIgnored(normalized)) {
      return { kind: "unmatched", normalized };
    }

    const exact = this.exact.get(normalized);
    if (exact) {
      return { kind: "matched", label: exact, normalized };
    }

    const prefixed = this.byLength.find((entry) =>
      normalized.startsWith(`${entry.synonym} `),
    );
    if (
      prefixed &&
      !PERIOD_CAPTION.test(normalized.slice(prefixed.synonym.length + 1))
    ) {
      return { kind: "matched", label: prefixed.label, normalized };
    }

    return { kind: "unmatched", normalized };
  }

  private isIgnored(normalized: string): boolean {
    const padded = ` ${normalized} `;
    return this.ignoredTerms.some((term) => padded.includes(` ${term} `));
  }
}

export const defaultLabelDictionary = LabelDictionary.fromData(synonymData);

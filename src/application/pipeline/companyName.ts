import type { Page } from "../../core/entities/document";

export const COMPANY_SCAN_PAGES = 5;

const SUFFIX = /^(Limited|LIMITED|Ltd\.?|LTD\.?)[,;:)]*$/;
const NAME_WORD = /^[A-Z][A-Za-z0-9&'’.-]*$/;
const CONNECTORS: ReadonlySet<string> = new Set(["of", "and", "&"]);
const BLACKLIST =
  /^(?:BSE|NSE|Exchange|Societe|Luxembourg|SEBI|Board|Phiroze|Stock)$/i;
const MAX_NAME_WORDS = 7;
const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

type Candidate = {
  name: string;
  count: number;
};

/**
 * Reads the capitalized words in front of a "Limited"/"Ltd." suffix.
 * Names that run into an exchange or regulator name are rejected.
 */
const nameEndingAt = (words: string[], suffixIndex: number): string | null => {
  const suffix = SUFFIX.exec(words[suffixIndex] ?? "")?.[1];
  if (!suffix) {
    return null;
  }

  const name: string[] = [];
  for (
    let index = suffixIndex - 1;
    index >= 0 && name.length < MAX_NAME_WORDS;
    index -= 1
  ) {
    const word = words[index] ?? "";
    if (BLACKLIST.test(word)) {
      return null;
    }
    if (!NAME_WORD.test(word) && !CONNECTORS.has(word)) {
      break;
    }
    name.unshift(word);
  }

  while (name.length > 0 && CONNECTORS.has(name[0] ?? "")) {
    name.shift();
  }

  return name.length > 0 ? [...name, suffix].join(" ") : null;
};

const keyOf = (name: string): string =>
  name.toLowerCase().replace(/\.$/, "");

/**
 * Collects "<Name> Limited" mentions from the opening pages and picks the issuer's name:
 * the most frequent candidate, then the longest.
 */
export class CompanyNameCollector {
  private readonly candidates = new Map<string, Candidate>();

  constructor(private readonly scanPages: number = COMPANY_SCAN_PAGES) {}

  consumePage(page: Page): void {
    if (page.pageNumber > this.scanPages) {
      return;
    }

    for (const line of page.text.split("\n")) {
      const words = line.trim().split(/\s+/);
      words.forEach((_, index) => {
        const name = nameEndingAt(words, index);
        if (name) {
          this.add(name);
        }
      });
    }
  }

  best(): string | null {
    let best: Candidate | null = null;
    for (const candidate of this.candidates.values()) {
      if (
        !best ||
        candidate.count > best.count ||
        (candidate.count === best.count &&
          candidate.name.length > best.name.length)
      ) {
        best = candidate;
      }
    }

    return best?.name ?? null;
  }

  private add(name: string): void {
    const key = keyOf(name);
    const existing = this.candidates.get(key);
    this.candidates.set(key, {
      name: existing?.name ?? name,
      count: (existing?.count ?? 0) + 1,
    });
  }
}

/**
 * Derives a display name from an upload name such as "<uuid>_acme-chemicals_rhp.pdf":
 * the first token that is not a UUID, upper-cased.
 */
export const companyNameFromFileName = (fileName: string): string => {
  const base = fileName.replace(/^.*[\\/]/, "").replace(/\.[^.]+$/, "");
  const token = base
    .split(/[_\s.]+/)
    .find((part) => part && !UUID_PATTERN.test(part));

  return token ? token.replace(/-/g, " ").toUpperCase() : "UNKNOWN";
};

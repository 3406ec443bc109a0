const ABBREVIATIONS: ReadonlySet<string> = new Set([
  "mr",
  "mrs",
  "ms",
  "dr",
  "st",
  "ltd",
  "pvt",
  "co",
  "inc",
  "corp",
  "rs",
  "no",
  "nos",
  "vs",
  "viz",
  "approx",
  "e.g",
  "i.e",
  "sr",
  "jr",
]);

const BOUNDARY = /[.!?]["'”’)]*\s+/g;
const SENTENCE_START = /^["'“‘(]?[A-Z0-9]/;

const isProtected = (paragraph: string, punctuationIndex: number): boolean => {
  if (paragraph[punctuationIndex] !== ".") {
    return false;
  }

  const before = paragraph.slice(0, punctuationIndex);
  const word = (before.split(/\s+/).pop() ?? "").replace(/^["'“‘(]+/, "");

  return ABBREVIATIONS.has(word.toLowerCase()) || /^[A-Z]$/.test(word);
};

const splitParagraph = (paragraph: string): string[] => {
  const sentences: string[] = [];
  let start = 0;
  for (const match of paragraph.matchAll(BOUNDARY)) {
    const index = match.index ?? 0;
    const next = index + match[0].length;
    if (
      !SENTENCE_START.test(paragraph.slice(next)) ||
      isProtected(paragraph, index)
    ) {
      continue;
    }

    sentences.push(paragraph.slice(start, next).trim());
    start = next;
  }
  sentences.push(paragraph.slice(start).trim());

  return sentences.filter(Boolean);
};

/**
 * Splits prose into sentences at terminal punctuation followed by a capital, digit or quote,
 * and at blank lines. Abbreviations such as "Ltd." and "Rs." and single initials do not end a sentence.
 */
export const splitSentences = (text: string): string[] =>
  text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .flatMap(splitParagraph);

export const tokenize = (sentence: string): string[] =>
  sentence.toLowerCase().match(/[a-z0-9]+/g) ?? [];

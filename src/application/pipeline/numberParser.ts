import type { UnitScale } from "../../core/entities/financial";

export type ParsedAmount = {
  value: number;
  /** Multiplier carried by an explicit suffix such as "Cr"; null when the token is untagged. */
  multiplier: number | null;
};

type UnitRule = {
  pattern: RegExp;
  unit: string;
  multiplier: number;
};

const unitRules: UnitRule[] = [
  { pattern: /^(?:cr|crs|crore|crores)\.?$/i, unit: "crore", multiplier: 1e7 },
  {
    pattern: /^(?:lakh|lakhs|lac|lacs)\.?$/i,
    unit: "lakh",
    multiplier: 1e5,
  },
  {
    pattern: /^(?:mn|mio|million|millions)\.?$/i,
    unit: "million",
    multiplier: 1e6,
  },
  {
    pattern: /^(?:bn|billion|billions)\.?$/i,
    unit: "billion",
    multiplier: 1e9,
  },
  {
    pattern: /^(?:k|thousand|thousands)\.?$/i,
    unit: "thousand",
    multiplier: 1e3,
  },
];

const CURRENCY_PREFIX = /^(?:₹|rs\.?|inr|us\$|\$|usd|€|£)\s*/i;
const NIL_PATTERN = /^[-–—]$/;
const AMOUNT_PATTERN = /^(\d[\d.,]*)\s*([A-Za-z]+\.?)?$/;

export const BASE_UNIT_SCALE: UnitScale = { unit: "units", multiplier: 1 };

export const matchUnit = (word: string): UnitRule | null =>
  unitRules.find((rule) => rule.pattern.test(word.trim())) ?? null;

const countOf = (value: string, char: string): number =>
  value.split(char).length - 1;

/**
 * Resolves thousands and decimal separators for "1,23,456.78", "1.234,5", "12,5" and friends.
 * The right-most separator is the decimal point when both kinds appear.
 */
const normalizeSeparators = (digits: string): string | null => {
  const commas = countOf(digits, ",");
  const periods = countOf(digits, ".");

  if (commas > 0 && periods > 0) {
    const decimal =
      digits.lastIndexOf(",") > digits.lastIndexOf(".") ? "," : ".";
    const thousands = decimal === "," ? "." : ",";
    if (countOf(digits, decimal) > 1) {
      return null;
    }

    return digits.split(thousands).join("").replace(decimal, ".");
  }

  if (commas > 0) {
    const afterComma = digits.length - digits.lastIndexOf(",") - 1;
    if (commas === 1 && afterComma !== 3) {
      return digits.replace(",", ".");
    }

    return digits.split(",").join("");
  }

  if (periods > 1) {
    return digits.split(".").join("");
  }

  return digits;
};

/**
 * Parses one table cell into a signed amount.
 * Returns null for anything that is not a plain figure (percentages, dates, words).
 */
export const parseAmount = (token: string): ParsedAmount | null => {
  let text = token.trim().replace(CURRENCY_PREFIX, "");
  if (NIL_PATTERN.test(text)) {
    return { value: 0, multiplier: null };
  }

  let negative = false;
  const parenthesized = /^\((.*)\)$/.exec(text);
  if (parenthesized) {
    negative = true;
    text = (parenthesized[1] ?? "").trim().replace(CURRENCY_PREFIX, "");
  } else if (/^[-−–]/.test(text)) {
    negative = true;
    text = text.slice(1).trim();
  }

  const match = AMOUNT_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const digits = match[1] ?? "";
  if (!/\d$/.test(digits)) {
    return null;
  }

  const suffix = match[2];
  let multiplier: number | null = null;
  if (suffix) {
    const rule = matchUnit(suffix);
    if (!rule) {
      return null;
    }
    multiplier = rule.multiplier;
  }

  const normalized = normalizeSeparators(digits);
  if (normalized === null) {
    return null;
  }

  const value = Number(normalized);
  if (!Number.isFinite(value)) {
    return null;
  }

  return { value: negative ? -value : value, multiplier };
};

const SCALE_IN_PARENS =
  /\(([^()]{0,60}?\bin\s+(?:(?:₹|rs\.?|inr|us\$|\$|usd)\s*)?([a-z]+)[^()]{0,30})\)/gi;
const SCALE_IN_PROSE =
  /\b(?:all\s+)?(?:amounts?|figures?)\s+(?:are\s+)?in\s+(?:(?:₹|rs\.?|inr|us\$|\$|usd)\s*)?([a-z]+)/gi;

/**
 * Detects a statement-level unit declaration such as "(₹ in crores)" or "All amounts in ₹ million".
 */
export const detectUnitScale = (text: string): UnitScale | null => {
  const candidates = [
    ...Array.from(text.matchAll(SCALE_IN_PARENS), (match) => match[2]),
    ...Array.from(text.matchAll(SCALE_IN_PROSE), (match) => match[1]),
  ];

  for (const word of candidates) {
    if (!word) {
      continue;
    }

    const rule = matchUnit(word);
    if (rule) {
      return { unit: rule.unit, multiplier: rule.multiplier };
    }
  }

  return null;
};

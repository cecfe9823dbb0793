import type { ResultType, TossDecision } from "./types.js";

const MISSING_TOKENS = new Set(["", "na", "n/a", "nan", "null", "none", "-"]);
const plainNumber = /^-?\d+(?:\.\d+)?$/;
const isoDate = /^(\d{4})-(\d{2})-(\d{2})$/;

export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function isMissingToken(value: string): boolean {
  return MISSING_TOKENS.has(normalizeWhitespace(value).toLowerCase());
}

export function parseNullableText(raw: string): string | null {
  const text = normalizeWhitespace(raw);
  return isMissingToken(text) ? null : text;
}

/** `undefined` means the cell held something that is neither a number nor a missing marker. */
export function parseNullableNumber(raw: string): number | null | undefined {
  const text = normalizeWhitespace(raw);
  if (isMissingToken(text)) {
    return null;
  }
  if (!plainNumber.test(text)) {
    return undefined;
  }
  return Number(text);
}

export function parseResultType(raw: string): ResultType | undefined {
  const text = normalizeWhitespace(raw).toLowerCase().replace(/[\s_]+/g, "-");
  if (text === "runs" || text === "wickets" || text === "tie" || text === "no-result") {
    return text;
  }
  return undefined;
}

export function parseTossDecision(raw: string): TossDecision | undefined {
  const text = normalizeWhitespace(raw).toLowerCase();
  if (text === "bat" || text === "field") {
    return text;
  }
  return undefined;
}

export function parseYesNo(raw: string): boolean | undefined {
  const text = normalizeWhitespace(raw).toUpperCase();
  if (text === "Y") {
    return true;
  }
  if (text === "N") {
    return false;
  }
  return undefined;
}

export function isValidIsoDate(raw: string): boolean {
  const match = normalizeWhitespace(raw).match(isoDate);
  if (!match) {
    return false;
  }
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const parsed = new Date(Date.UTC(year, month - 1, day));
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

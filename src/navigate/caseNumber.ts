import { InvalidCaseNumberError } from "../errors";

// Latin look-alikes of the Cyrillic letters that appear in court prefixes.
const CYRILLIC_TO_LATIN: Record<string, string> = {
  А: "A",
  В: "B",
  Е: "E",
  К: "K",
  М: "M",
  Н: "H",
  О: "O",
  Р: "P",
  С: "C",
  Т: "T",
  У: "Y",
  Х: "X",
};

const CASE_NUMBER_PATTERN = /^[A-ZА-ЯЁ]{1,3}\d{0,3}-\d{1,7}\/\d{4}$/;

export function normalizeCaseNumber(raw: string): string {
  return raw
    .trim()
    .toUpperCase()
    .replace(/\s+/g, "")
    .replace(/[‐‑‒–—]/g, "-")
    .replace(/[А-ЯЁ]/g, (letter) => CYRILLIC_TO_LATIN[letter] ?? letter);
}

export function isValidCaseNumber(raw: string): boolean {
  return CASE_NUMBER_PATTERN.test(normalizeCaseNumber(raw));
}

/** Returns the trimmed input, or throws before any browser work starts. */
export function parseCaseNumber(raw: string): string {
  if (!isValidCaseNumber(raw)) {
    throw new InvalidCaseNumberError(raw);
  }
  return raw.trim().replace(/\s+/g, "");
}

export function caseDirectoryName(caseNumber: string): string {
  return `case_${caseNumber.replace(/\//g, "-")}`;
}

const FILENAME_DATE = /_(\d{4})(\d{2})(\d{2})_/;

/** `A60-21280-2023_20251204_Opredelenie.pdf` → `2025-12-04` */
export function dateFromFilename(filename: string): string | null {
  const match = filename.match(FILENAME_DATE);
  if (!match) {
    return null;
  }
  const [, year, month, day] = match;
  return `${year}-${month}-${day}`;
}

/** `A60-21280-2023_20251204_Opredelenie.pdf` → `Opredelenie` */
export function docTypeFromFilename(filename: string): string | null {
  const dot = filename.lastIndexOf(".");
  const stem = dot > 0 ? filename.slice(0, dot) : filename;
  const parts = stem.split("_");
  if (parts.length < 3) {
    return null;
  }
  const last = parts[parts.length - 1];
  if (!last) {
    return null;
  }
  return last.charAt(0).toUpperCase() + last.slice(1).toLowerCase();
}

/** Collapses whitespace and title-cases words, keeping short abbreviations such as "АС". */
export function normalizeCourtName(raw: string): string {
  return raw
    .split(/\s+/)
    .filter((word) => word.length > 0)
    .map((word) => {
      if (word.length <= 3 && word === word.toUpperCase()) {
        return word;
      }
      return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
    })
    .join(" ");
}

export const DATE_SOURCE = String.raw`\d{4}-\d{2}-\d{2}|\d{1,2}\/\d{1,2}\/\d{4}`;

export function splitLines(text: string): string[] {
  return text.split(/\r?\n/).map((line) => line.trim());
}

/** "54,000.00" -> 54000 */
export function parseDecimal(value: string): number {
  return Number(value.replace(/,/g, ""));
}

/**
 * Normalise `YYYY-MM-DD` or day-first `DD/MM/YYYY` to ISO. Dates that do
 * not exist on the calendar become null.
 */
export function parseDate(value: string | undefined): string | null {
  if (!value) return null;

  let year: number;
  let month: number;
  let day: number;

  const iso = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  const dayFirst = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(value);
  if (iso) {
    year = Number(iso[1]);
    month = Number(iso[2]);
    day = Number(iso[3]);
  } else if (dayFirst) {
    day = Number(dayFirst[1]);
    month = Number(dayFirst[2]);
    year = Number(dayFirst[3]);
  } else {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date.toISOString().slice(0, 10);
}

import { format, isValid, parse } from "date-fns";

const REFERENCE_DATE = new Date(2000, 0, 1);

export function formatSectionDate(date: Date, dateFormat: string): string {
  return format(date, dateFormat);
}

export function formatStamp(date: Date, dateFormat: string): string {
  return format(date, `${dateFormat} hh:mma`);
}

/**
 * True when `text` is exactly what `dateFormat` produces for some calendar date.
 * Looser spellings that date-fns would still accept (missing zero padding,
 * overflowing days) are rejected by formatting the parsed value back.
 */
export function isSectionDate(text: string, dateFormat: string): boolean {
  try {
    const parsed = parse(text, dateFormat, REFERENCE_DATE);
    return isValid(parsed) && format(parsed, dateFormat) === text;
  } catch {
    return false;
  }
}

/** A usable format names the day, month and year unambiguously. */
export function isUsableDateFormat(dateFormat: string): boolean {
  const sample = new Date(2001, 10, 23);
  try {
    const text = format(sample, dateFormat);
    const parsed = parse(text, dateFormat, REFERENCE_DATE);
    return (
      isValid(parsed) &&
      parsed.getFullYear() === sample.getFullYear() &&
      parsed.getMonth() === sample.getMonth() &&
      parsed.getDate() === sample.getDate() &&
      !/[\r\n]/.test(text)
    );
  } catch {
    return false;
  }
}

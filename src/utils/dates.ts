/**
 * Date handling for document dates.
 *
 * Dates are normalized to ISO calendar strings (YYYY-MM-DD), which compare
 * correctly as plain strings.
 */

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;
const DAY_FIRST = /^(\d{1,2})[./-](\d{1,2})[./-](\d{4})$/;

function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const candidate = new Date(Date.UTC(year, month - 1, day));
  return candidate.getUTCFullYear() === year && candidate.getUTCMonth() === month - 1 && candidate.getUTCDate() === day;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Normalize a document date into YYYY-MM-DD. European day-first dates
 * ("31/01/2026", "31.01.2026") are accepted as well. Returns null for
 * anything that is not a real calendar date.
 */
export function normalizeDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const text = value.trim();

  const iso = ISO_DATE.exec(text);
  if (iso) {
    const [year, month, day] = [Number(iso[1]), Number(iso[2]), Number(iso[3])];
    return isValidCalendarDate(year, month, day) ? `${iso[1]}-${iso[2]}-${iso[3]}` : null;
  }

  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    const [day, month, year] = [Number(dayFirst[1]), Number(dayFirst[2]), Number(dayFirst[3])];
    return isValidCalendarDate(year, month, day) ? `${year}-${pad(month)}-${pad(day)}` : null;
  }

  return null;
}

/**
 * True when `date` falls in [from, until). Either bound may be open.
 */
export function isWithin(date: string, from?: string, until?: string): boolean {
  if (from && date < from) return false;
  if (until && date >= until) return false;
  return true;
}

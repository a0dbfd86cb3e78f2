import type { DateFormat } from '../schemas/index.js';

const PATTERNS: Record<DateFormat, RegExp> = {
  'DD/MM/YYYY': /^(?<day>\d{1,2})\/(?<month>\d{1,2})\/(?<year>\d{2}|\d{4})$/,
  'MM/DD/YYYY': /^(?<month>\d{1,2})\/(?<day>\d{1,2})\/(?<year>\d{2}|\d{4})$/,
  'YYYY-MM-DD': /^(?<year>\d{4})-(?<month>\d{1,2})-(?<day>\d{1,2})$/,
  'DD.MM.YYYY': /^(?<day>\d{1,2})\.(?<month>\d{1,2})\.(?<year>\d{2}|\d{4})$/,
  'DD/MM': /^(?<day>\d{1,2})\/(?<month>\d{1,2})$/,
};

/**
 * Parse a statement date into an ISO `YYYY-MM-DD` string.
 *
 * Day/month formats need `yearHint`. When the transaction month is later than
 * `referenceMonth` (the month the statement closed), the date belongs to the
 * previous year.
 */
export function parseStatementDate(
  dateStr: string,
  format: DateFormat,
  options: { yearHint?: number | undefined; referenceMonth?: number | undefined } = {}
): string {
  const trimmed = dateStr.trim();
  const match = PATTERNS[format].exec(trimmed);
  const groups = match?.groups;
  if (groups === undefined) {
    throw new Error(`Date does not match ${format}: ${dateStr}`);
  }

  const day = parseInt(groups['day'] ?? '', 10);
  const month = parseInt(groups['month'] ?? '', 10);
  let year: number;

  const yearGroup = groups['year'];
  if (yearGroup !== undefined) {
    year = yearGroup.length === 2 ? 2000 + parseInt(yearGroup, 10) : parseInt(yearGroup, 10);
  } else {
    if (options.yearHint === undefined) {
      throw new Error(`Year is required to parse ${dateStr}`);
    }
    year = options.yearHint;
    if (options.referenceMonth !== undefined && month > options.referenceMonth) {
      year -= 1;
    }
  }

  if (!isValidCalendarDate(year, month, day)) {
    throw new Error(`Not a calendar date: ${dateStr}`);
  }

  return toISODate(year, month, day);
}

/**
 * Best-effort parse for dates typed by hand into the sheet: ISO first, then DD/MM/YYYY.
 */
export function parseLooseDate(dateStr: string): string | null {
  for (const format of ['YYYY-MM-DD', 'DD/MM/YYYY'] as const) {
    try {
      return parseStatementDate(dateStr, format);
    } catch {
      continue;
    }
  }
  return null;
}

export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth;
}

export function toISODate(year: number, month: number, day: number): string {
  return `${year.toString().padStart(4, '0')}-${month.toString().padStart(2, '0')}-${day.toString().padStart(2, '0')}`;
}

export function isValidISODate(dateStr: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(dateStr);
  if (match === null) return false;
  return isValidCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function formatBrazilianDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-');
  if (year === undefined || month === undefined || day === undefined) {
    return isoDate;
  }
  return `${day}/${month}/${year}`;
}

export function compareDates(a: string, b: string): number {
  return a.localeCompare(b);
}

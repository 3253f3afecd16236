const DAY_MS = 24 * 60 * 60 * 1000;

// ISO (2025-01-31), day-first dotted (31.01.2025, 31. 1. 2025) or slashed (31/01/2025)
const DATE_TOKEN = /(\d{4})-(\d{1,2})-(\d{1,2})|(\d{1,2})\.\s*(\d{1,2})\.\s*(\d{4})|(\d{1,2})\/(\d{1,2})\/(\d{4})/g;

function calendarDate(year: number, month: number, day: number): Date | null {
  const date = new Date(Date.UTC(year, month - 1, day));
  const valid =
    date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
  return valid ? date : null;
}

/**
 * Every date found in `text`, in order of appearance, as UTC midnight.
 * Tokens that are not real calendar dates (31.02.2025) are returned as null.
 */
export function findDates(text: string): Array<Date | null> {
  const dates: Array<Date | null> = [];
  for (const match of text.matchAll(DATE_TOKEN)) {
    if (match[1] !== undefined) {
      dates.push(calendarDate(Number(match[1]), Number(match[2]), Number(match[3])));
    } else if (match[4] !== undefined) {
      dates.push(calendarDate(Number(match[6]), Number(match[5]), Number(match[4])));
    } else {
      dates.push(calendarDate(Number(match[9]), Number(match[8]), Number(match[7])));
    }
  }
  return dates;
}

/**
 * The first date in `text`, or null when there is none or it is invalid.
 */
export function parseCalendarDate(text: string): Date | null {
  const [first] = findDates(text);
  return first ?? null;
}

/**
 * Inclusive day count between two dates; null when the range ends before it starts.
 */
export function inclusiveDays(start: Date, end: Date): number | null {
  const difference = Math.round((end.getTime() - start.getTime()) / DAY_MS);
  return difference < 0 ? null : difference + 1;
}

/**
 * Day count of a "<start> - <end>" range in any supported date notation.
 */
export function daysInRange(text: string): number | null {
  const [start, end] = findDates(text);
  if (!start || !end) {
    return null;
  }
  return inclusiveDays(start, end);
}

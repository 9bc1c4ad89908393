/**
 * CalendarDate - a day without time of day.
 *
 * Dataset dates and as-of dates are plain calendar days, so comparisons
 * never look below day granularity. Backed by a local-midnight Date and
 * date-fns for parsing, formatting and day arithmetic.
 *
 * @module calendar_date
 */

import { differenceInCalendarDays, format, isValid, parse, startOfDay } from 'date-fns';

export const CALENDAR_DATE_FORMAT = 'yyyy-MM-dd';

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export class CalendarDate {
  private readonly day: Date;

  private constructor(day: Date) {
    this.day = day;
  }

  /**
   * Parses `YYYY-MM-DD`. Returns null for anything else, including
   * out-of-range days such as 2021-02-30.
   */
  static parse(text: string): CalendarDate | null {
    if (!CALENDAR_DATE_PATTERN.test(text)) {
      return null;
    }
    const parsed = parse(text, CALENDAR_DATE_FORMAT, new Date(2000, 0, 1));
    if (!isValid(parsed) || format(parsed, CALENDAR_DATE_FORMAT) !== text) {
      return null;
    }
    return new CalendarDate(startOfDay(parsed));
  }

  /** Calendar day of a timestamp, in local time. */
  static fromDate(date: Date): CalendarDate {
    return new CalendarDate(startOfDay(date));
  }

  /**
   * @throws RangeError for a day that does not exist, such as 2021-02-30
   */
  static of(year: number, month: number, day: number): CalendarDate {
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
      throw new RangeError(`Invalid calendar date: ${year}-${month}-${day}`);
    }
    return new CalendarDate(date);
  }

  compare(other: CalendarDate): number {
    return Math.sign(differenceInCalendarDays(this.day, other.day));
  }

  isBefore(other: CalendarDate): boolean {
    return this.compare(other) < 0;
  }

  isAfter(other: CalendarDate): boolean {
    return this.compare(other) > 0;
  }

  isSameDay(other: CalendarDate): boolean {
    return this.compare(other) === 0;
  }

  /** Signed number of days from this date to `other`. */
  daysUntil(other: CalendarDate): number {
    return differenceInCalendarDays(other.day, this.day);
  }

  toString(): string {
    return format(this.day, CALENDAR_DATE_FORMAT);
  }

  toJSON(): string {
    return this.toString();
  }
}

/** Orders nullable dates with absent values last. */
export function compareNullableDates(a: CalendarDate | null, b: CalendarDate | null): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a.compare(b);
}

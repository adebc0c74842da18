import type { CalendarDate, DateRange, RangeSelection } from '../types/index.js';
import { InvalidRangeError } from '../errors.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Local calendar fields, not UTC: "today" is the user's today
export function toCalendarDate(date: Date): CalendarDate {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function isCalendarDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) return false;

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  // setFullYear, the Date constructor maps years 0-99 to 1900-1999
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month - 1, day);
  return date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day;
}

/**
 * Turns a period selection into concrete start/end dates.
 * Only `custom` can fail: a start after the end throws InvalidRangeError.
 */
export function resolveDateRange(selection: RangeSelection, today: Date = new Date()): DateRange {
  switch (selection.mode) {
    case 'this_month':
      return {
        start: toCalendarDate(new Date(today.getFullYear(), today.getMonth(), 1)),
        end: toCalendarDate(today)
      };
    case 'last_month':
      return {
        start: toCalendarDate(new Date(today.getFullYear(), today.getMonth() - 1, 1)),
        // day 0 of this month is the last day of the previous one
        end: toCalendarDate(new Date(today.getFullYear(), today.getMonth(), 0))
      };
    case 'custom':
      if (selection.start > selection.end) {
        throw new InvalidRangeError(
          `Start date ${selection.start} must be on or before end date ${selection.end}.`
        );
      }
      return { start: selection.start, end: selection.end };
  }
}

import { DateTime } from 'luxon';
import type { Birthday } from './fields.js';

export const DEFAULT_BIRTHDAY_WINDOW_DAYS = 7;

/**
 * Moves a birthday onto the year of `today`. Returns null when the date does not
 * exist in that year (29 February outside a leap year).
 */
export function projectOntoYear(birthday: Birthday, today: DateTime): DateTime | null {
  const { month, day } = birthday.monthDay();
  const candidate = DateTime.fromObject({ year: today.year, month, day }, { zone: today.zone });
  return candidate.isValid ? candidate : null;
}

/**
 * Whether `candidate` lies between `today` and `today + windowDays`, both ends
 * inclusive, compared by calendar day.
 */
export function isWithinWindow(candidate: DateTime, today: DateTime, windowDays: number): boolean {
  const start = today.startOf('day');
  const end = start.plus({ days: windowDays });
  const day = candidate.startOf('day');
  return day >= start && day <= end;
}

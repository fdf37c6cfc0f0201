import { format, startOfDay, subDays } from 'date-fns';
import { API_DATE_FORMAT, MAX_DAYS_OFFSET } from '../config/constants.js';
import { InvalidOffsetError } from '../errors.js';

export function assertValidOffset(daysOffset: number): void {
  if (!Number.isInteger(daysOffset) || daysOffset <= 0 || daysOffset > MAX_DAYS_OFFSET) {
    throw new InvalidOffsetError(daysOffset);
  }
}

/**
 * Calendar days from `today - daysOffset` up to yesterday, oldest first.
 * Today itself is never part of the range.
 */
export function buildDateRange(daysOffset: number, today: Date = new Date()): Date[] {
  assertValidOffset(daysOffset);

  const base = startOfDay(today);
  const range: Date[] = [];
  for (let i = daysOffset; i >= 1; i--) {
    range.push(subDays(base, i));
  }
  return range;
}

export function formatApiDate(date: Date): string {
  return format(date, API_DATE_FORMAT);
}

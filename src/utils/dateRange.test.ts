import { describe, it, expect } from 'vitest';
import { buildDateRange, formatApiDate } from './dateRange.js';
import { InvalidOffsetError } from '../errors.js';

const today = new Date(2024, 0, 3, 15, 30);

describe('buildDateRange', () => {
  it('returns the days before today, oldest first', () => {
    expect(buildDateRange(2, today).map(formatApiDate)).toEqual(['01.01.2024', '02.01.2024']);
  });

  it('returns only yesterday for an offset of 1', () => {
    expect(buildDateRange(1, today).map(formatApiDate)).toEqual(['02.01.2024']);
  });

  it('returns exactly `offset` distinct increasing days, none of them today', () => {
    for (let offset = 1; offset <= 10; offset++) {
      const range = buildDateRange(offset, today);
      const formatted = range.map(formatApiDate);

      expect(range).toHaveLength(offset);
      expect(new Set(formatted).size).toBe(offset);
      expect(formatted).not.toContain('03.01.2024');
      expect(formatted[formatted.length - 1]).toBe('02.01.2024');
      for (let i = 1; i < range.length; i++) {
        expect(range[i].getTime()).toBeGreaterThan(range[i - 1].getTime());
      }
    }
  });

  it('crosses month boundaries on the calendar', () => {
    const range = buildDateRange(3, new Date(2024, 2, 1, 0, 5));
    expect(range.map(formatApiDate)).toEqual(['27.02.2024', '28.02.2024', '29.02.2024']);
  });

  it.each([0, -1, 11, 2.5, Number.NaN])('rejects offset %s', offset => {
    expect(() => buildDateRange(offset, today)).toThrow(InvalidOffsetError);
    expect(() => buildDateRange(offset, today)).toThrow(
      'Incorrect offset value. Please choose value from 1 to 10.'
    );
  });
});

describe('formatApiDate', () => {
  it('uses day.month.year with padding', () => {
    expect(formatApiDate(new Date(2023, 8, 7))).toBe('07.09.2023');
  });
});

import { describe, it, expect } from 'vitest';
import { formatDate, isCalendarDate } from '@dentdesk/shared';

describe('formatDate', () => {
  it('formats local date parts with zero padding', () => {
    expect(formatDate(new Date(2026, 0, 5, 23, 59))).toBe('2026-01-05');
    expect(formatDate(new Date(2026, 9, 19, 0, 0))).toBe('2026-10-19');
  });
});

describe('isCalendarDate', () => {
  it('accepts real dates', () => {
    expect(isCalendarDate('2026-10-19')).toBe(true);
    expect(isCalendarDate('2028-02-29')).toBe(true);
  });

  it('rejects impossible dates', () => {
    expect(isCalendarDate('2026-02-30')).toBe(false);
    expect(isCalendarDate('2026-13-01')).toBe(false);
    expect(isCalendarDate('2027-02-29')).toBe(false);
  });

  it('rejects other formats', () => {
    expect(isCalendarDate('19/10/2026')).toBe(false);
    expect(isCalendarDate('2026-1-5')).toBe(false);
    expect(isCalendarDate('')).toBe(false);
  });
});

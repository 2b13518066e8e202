import { describe, it, expect } from 'vitest';
import {
  formatNumber,
  formatTimestamp,
  hourInTimeZone,
  isoDateToUnix,
  mean,
  round1,
  shiftDate,
} from './weatherUtils';

describe('shiftDate', () => {
  it('moves across month, year and leap-day boundaries', () => {
    expect(shiftDate('2026-03-01', -1)).toBe('2026-02-28');
    expect(shiftDate('2024-03-01', -1)).toBe('2024-02-29');
    expect(shiftDate('2025-12-31', 1)).toBe('2026-01-01');
    expect(shiftDate('2026-03-10', -30)).toBe('2026-02-08');
  });
});

describe('isoDateToUnix', () => {
  it('rejects malformed dates', () => {
    expect(() => isoDateToUnix('2026-13-45')).toThrow('Invalid ISO date string: 2026-13-45');
  });
});

describe('time zone helpers', () => {
  const instant = new Date('2026-01-15T02:30:00.000Z');

  it('reads the hour in the configured zone', () => {
    expect(hourInTimeZone(instant, 'Asia/Shanghai')).toBe(10);
    expect(hourInTimeZone(instant, 'UTC')).toBe(2);
  });

  it('formats a timestamp in the configured zone', () => {
    expect(formatTimestamp(instant, 'Asia/Shanghai')).toBe('2026-01-15 10:30');
  });
});

describe('numbers', () => {
  it('averages values', () => {
    expect(mean([18, 20, 22])).toBe(20);
    expect(() => mean([])).toThrow();
  });

  it('rounds to one decimal', () => {
    expect(round1(3.14159)).toBe(3.1);
    expect(round1(2.25)).toBe(2.3);
  });

  it('formats with one decimal and an optional sign', () => {
    expect(formatNumber(5, 'en-US', true)).toBe('+5.0');
    expect(formatNumber(0, 'en-US', true)).toBe('0.0');
    expect(formatNumber(20, 'en-US')).toBe('20.0');
  });
});

import { describe, it, expect } from 'vitest';
import { IncompleteDayError } from '../errors';
import { extractDay, sortByTimestamp, utcDateKey, utcHourLabel } from '../modules/DayExtractor';
import { dayTimestamps, intensityRows } from './fixtures';

const twoDays = [...intensityRows('2024-02-05'), ...intensityRows('2024-02-06')];

describe('utcDateKey / utcHourLabel', () => {
  it('reads the UTC calendar date and hour', () => {
    expect(utcDateKey('2024-02-05T23:00:00Z')).toBe('2024-02-05');
    expect(utcHourLabel('2024-02-05T23:00:00Z')).toBe('23:00');
  });

  it('normalises offsets to UTC', () => {
    expect(utcDateKey('2024-02-06T00:30:00+01:00')).toBe('2024-02-05');
    expect(utcHourLabel('2024-02-06T00:30:00+01:00')).toBe('23:30');
  });
});

describe('sortByTimestamp', () => {
  it('sorts by instant without mutating the input', () => {
    const rows = [{ timestamp: '2024-02-05T02:00:00Z' }, { timestamp: '2024-02-05T01:00:00Z' }];
    const sorted = sortByTimestamp(rows);
    expect(sorted.map(r => r.timestamp)).toEqual(['2024-02-05T01:00:00Z', '2024-02-05T02:00:00Z']);
    expect(rows[0].timestamp).toBe('2024-02-05T02:00:00Z');
  });
});

describe('extractDay', () => {
  it('returns the 24 rows of the requested date in timestamp order', () => {
    const shuffled = [...twoDays].reverse();
    const day = extractDay(shuffled, '2024-02-06');
    expect(day.map(r => r.timestamp)).toEqual(dayTimestamps('2024-02-06'));
  });

  it('throws IncompleteDayError when an hour is missing', () => {
    const rows = twoDays.filter(r => r.timestamp !== '2024-02-05T07:00:00Z');
    expect(() => extractDay(rows, '2024-02-05')).toThrow(IncompleteDayError);
    expect(() => extractDay(rows, '2024-02-05')).toThrow('Expected 24 rows for 2024-02-05, got 23');
  });

  it('throws IncompleteDayError for a 25-row day', () => {
    const rows = [...twoDays, { ...twoDays[3] }];
    expect(() => extractDay(rows, '2024-02-05')).toThrow('Expected 24 rows for 2024-02-05, got 25');
  });

  it('throws when 24 rows cover fewer than 24 distinct hours', () => {
    const rows = twoDays.map(r =>
      r.timestamp === '2024-02-05T04:00:00Z' ? { ...r, timestamp: '2024-02-05T03:00:00Z' } : r,
    );
    expect(() => extractDay(rows, '2024-02-05')).toThrow('Expected 24 distinct hours for 2024-02-05, got 23');
  });

  it('reports the matched row count on the error', () => {
    try {
      extractDay(twoDays, '2024-02-07');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(IncompleteDayError);
      if (error instanceof IncompleteDayError) {
        expect(error.rowCount).toBe(0);
        expect(error.dateKey).toBe('2024-02-07');
        expect(error.code).toBe('incomplete_day');
      }
    }
  });

  it('matches nothing for a malformed date key', () => {
    expect(() => extractDay(twoDays, '05/02/2024')).toThrow('Expected 24 rows for 05/02/2024, got 0');
  });
});

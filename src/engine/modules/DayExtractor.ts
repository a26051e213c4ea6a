import { parseISO } from 'date-fns';
import { IncompleteDayError } from '../errors';
import { HOURS_PER_DAY, type TimestampedRow } from '../schema/ScenarioInputV1';

const DATE_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Epoch milliseconds of a row timestamp. */
export function timestampMs(timestamp: string): number {
  return parseISO(timestamp).getTime();
}

/** `YYYY-MM-DD` of the UTC calendar day a timestamp falls on. */
export function utcDateKey(timestamp: string): string {
  return new Date(timestampMs(timestamp)).toISOString().slice(0, 10);
}

/** "HH:MM" of a timestamp on the UTC grid. */
export function utcHourLabel(timestamp: string): string {
  return new Date(timestampMs(timestamp)).toISOString().slice(11, 16);
}

/** Stable sort by timestamp; returns a new array. */
export function sortByTimestamp<T extends TimestampedRow>(rows: ReadonlyArray<T>): T[] {
  return rows
    .map((row, i) => ({ row, i, t: timestampMs(row.timestamp) }))
    .sort((a, b) => a.t - b.t || a.i - b.i)
    .map(({ row }) => row);
}

/**
 * The 24 hourly rows of one UTC calendar day, sorted by timestamp.
 *
 * Throws IncompleteDayError when the day does not have exactly 24 rows on 24
 * distinct hours (gaps, duplicates, dataset boundary days). Daylight-saving
 * days never reach here: datasets are on a fixed UTC grid.
 */
export function extractDay<T extends TimestampedRow>(rows: ReadonlyArray<T>, dateKey: string): T[] {
  const day = DATE_KEY_PATTERN.test(dateKey)
    ? sortByTimestamp(rows.filter(row => utcDateKey(row.timestamp) === dateKey))
    : [];

  if (day.length !== HOURS_PER_DAY) {
    throw new IncompleteDayError(dateKey, day.length);
  }

  const hours = new Set(day.map(row => new Date(timestampMs(row.timestamp)).getUTCHours()));
  if (hours.size !== HOURS_PER_DAY) {
    throw new IncompleteDayError(
      dateKey,
      day.length,
      `Expected 24 distinct hours for ${dateKey}, got ${hours.size}`,
    );
  }

  return day;
}

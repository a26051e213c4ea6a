import type { GenerationMixRow, HourlySeries, IntensityRow } from '../schema/ScenarioInputV1';

/** 24 ISO timestamps on the hour for a UTC date key. */
export function dayTimestamps(date: string): string[] {
  return Array.from({ length: 24 }, (_, h) => `${date}T${String(h).padStart(2, '0')}:00:00Z`);
}

export function toSeries(date: string, values: readonly number[]): HourlySeries {
  const timestamps = dayTimestamps(date);
  return values.map((value, h) => ({ timestamp: timestamps[h], value }));
}

/**
 * Carbon intensity with hours 2, 3, 4, 5 as the four lowest values
 * (90, 80, 85, 95); the next lowest is 235 at 15:00.
 */
export const CI_LOW_NIGHT = [
  250, 240, 90, 80, 85, 95, 260, 300,
  310, 290, 280, 270, 265, 255, 245, 235,
  320, 380, 400, 390, 350, 300, 280, 260,
];

/** Renewable share peaking mid-afternoon; hours 12–15 are the top four. */
export const SHARE_AFTERNOON = [
  0.30, 0.31, 0.32, 0.33, 0.34, 0.35, 0.36, 0.40,
  0.45, 0.50, 0.55, 0.60, 0.80, 0.85, 0.82, 0.78,
  0.62, 0.50, 0.42, 0.38, 0.35, 0.33, 0.31, 0.30,
];

export function generationRows(date: string, shares: readonly number[] = SHARE_AFTERNOON): GenerationMixRow[] {
  return dayTimestamps(date).map((timestamp, h) => ({
    timestamp,
    RENEWABLE: shares[h] * 1000,
    GENERATION: 1000,
  }));
}

export function intensityRows(date: string, values: readonly number[] = CI_LOW_NIGHT): IntensityRow[] {
  return dayTimestamps(date).map((timestamp, h) => ({
    timestamp,
    CI_actual: values[h],
    CI_pred: values[h] + 10,
  }));
}

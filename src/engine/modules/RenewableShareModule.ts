import type { GenerationMixRow, HourlySeries } from '../schema/ScenarioInputV1';

/**
 * Renewable fraction of one hour's generation, clipped to [0, 1].
 *
 * Zero-generation policy: GENERATION ≤ 0, or any non-finite input or ratio,
 * yields 0 rather than NaN / Infinity.
 */
export function hourlyRenewableShare(renewable: number, generation: number): number {
  if (!Number.isFinite(renewable) || !Number.isFinite(generation) || generation <= 0) {
    return 0;
  }
  const ratio = renewable / generation;
  if (!Number.isFinite(ratio)) return 0;
  return Math.min(Math.max(ratio, 0), 1);
}

/** RENEWABLE / GENERATION per hour of a day slice. */
export function renewableShare(generationMixDay: ReadonlyArray<GenerationMixRow>): HourlySeries {
  return generationMixDay.map(row => ({
    timestamp: row.timestamp,
    value: hourlyRenewableShare(row.RENEWABLE, row.GENERATION),
  }));
}

/** Hours whose raw ratio fell outside [0, 1] or could not be computed. */
export function countClippedHours(generationMixDay: ReadonlyArray<GenerationMixRow>): number {
  return generationMixDay.filter(row => {
    const raw = row.RENEWABLE / row.GENERATION;
    return !Number.isFinite(raw) || raw < 0 || raw > 1;
  }).length;
}

import { HOURS_PER_DAY, type HourlySeries } from '../schema/ScenarioInputV1';

// ─── Constants ────────────────────────────────────────────────────────────────

/**
 * Canonical household consumption shape, 00:00 → 23:00.
 * Relative weights only: a low overnight base, a 07:00 breakfast bump and the
 * 17:00–19:00 evening peak.
 */
export const HOUSEHOLD_PROFILE_RAW: readonly number[] = Object.freeze([
  0.25, 0.23, 0.22, 0.22, 0.25,        // 00–04
  0.35, 0.55, 0.65, 0.60,              // 05–08
  0.55, 0.50, 0.48, 0.47, 0.50, 0.55,  // 09–14
  0.60, 0.75, 1.10, 1.20, 1.05,        // 15–19
  0.70, 0.55, 0.40, 0.30,              // 20–23
]);

const RAW_TOTAL = HOUSEHOLD_PROFILE_RAW.reduce((acc, w) => acc + w, 0);

// ─── Profile ──────────────────────────────────────────────────────────────────

/**
 * Hourly kWh for one day, proportional to HOUSEHOLD_PROFILE_RAW and summing to
 * `dailyEnergy`.
 *
 * Precondition: `dailyEnergy > 0`. Not validated here; the scenario engine
 * checks it before calling.
 */
export function makeProfile(dailyEnergy: number): number[] {
  const scale = dailyEnergy / RAW_TOTAL;
  return HOUSEHOLD_PROFILE_RAW.map(w => w * scale);
}

/** makeProfile aligned position-by-position to a 24-timestamp index. */
export function makeProfileSeries(dailyEnergy: number, timestamps: readonly string[]): HourlySeries {
  if (timestamps.length !== HOURS_PER_DAY) {
    throw new Error(
      `makeProfileSeries: expected ${HOURS_PER_DAY} timestamps, got ${timestamps.length}.`,
    );
  }
  const profile = makeProfile(dailyEnergy);
  return timestamps.map((timestamp, h) => ({ timestamp, value: profile[h] }));
}

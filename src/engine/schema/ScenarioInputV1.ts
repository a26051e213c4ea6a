import { z } from 'zod';

// ─── Hourly series ────────────────────────────────────────────────────────────

/** One hour-of-day sample. `timestamp` is an ISO-8601 UTC instant on the hour. */
export interface HourlyValue {
  timestamp: string;
  value: number;
}

/** Ordered hourly samples; core inputs carry exactly 24 entries. */
export type HourlySeries = ReadonlyArray<HourlyValue>;

export const HOURS_PER_DAY = 24;

// ─── Raw dataset rows ─────────────────────────────────────────────────────────

// Offset required: a bare local time would land on a different UTC day per host.
const isoTimestamp = z
  .string()
  .datetime({ offset: true, message: 'timestamp must be an ISO-8601 date-time with a UTC offset' });

/**
 * Generation-mix row. Field names follow the upstream grid dataset
 * (uppercase RENEWABLE / GENERATION, MW or MWh, units cancel in the share).
 */
export const GenerationMixRowSchema = z.object({
  timestamp: isoTimestamp,
  RENEWABLE: z.number(),
  GENERATION: z.number(),
});

/** Carbon-intensity row: measured and model-predicted gCO₂/kWh. Gaps are null. */
export const IntensityRowSchema = z.object({
  timestamp: isoTimestamp,
  CI_actual: z.number().nullable(),
  CI_pred: z.number().nullable(),
});

export type GenerationMixRow = z.infer<typeof GenerationMixRowSchema>;
export type IntensityRow = z.infer<typeof IntensityRowSchema>;

/** Anything carrying an hourly timestamp can be sliced by the day extractor. */
export interface TimestampedRow {
  timestamp: string;
}

// ─── Scenario parameters ──────────────────────────────────────────────────────

export type ShiftStrategyId = 'low_intensity' | 'max_renewable';

/** Which carbon-intensity column feeds the engine. */
export type CiSource = 'historical' | 'predicted';

export interface ShiftScenarioInput {
  /** Carbon intensity (gCO₂/kWh) for the day, any order. */
  ci: HourlySeries;
  /** Household daily consumption (kWh), > 0. */
  dailyEnergy: number;
  /** Fraction of load that can be moved, [0, 1]. */
  flexibleShare: number;
  strategy: ShiftStrategyId;
  /** Required for 'max_renewable'; must cover every timestamp of `ci`. */
  renewableShare?: HourlySeries;
  /** Number of hours the flexible energy is concentrated into, [1, 24]. */
  targetHourCount: number;
}

/** Everything the day pipeline needs on top of the aligned datasets. */
export interface DayScenarioRequest {
  /** Calendar date key, `YYYY-MM-DD` (UTC). */
  date: string;
  ciSource: CiSource;
  strategy: ShiftStrategyId;
  dailyEnergy: number;
  flexibleShare: number;
  targetHourCount: number;
}

// ─── Result ───────────────────────────────────────────────────────────────────

export interface ScenarioResult {
  /** Sorted timestamps shared by every array below. */
  timestamps: readonly string[];
  /** Carbon intensity (gCO₂/kWh). */
  ci: readonly number[];
  baselineLoad: readonly number[];
  nonFlexLoad: readonly number[];
  shiftedLoad: readonly number[];
  /** gCO₂ per hour. */
  baselineEmissions: readonly number[];
  shiftedEmissions: readonly number[];
  totalBaselineEmissions: number;
  totalShiftedEmissions: number;
  /** (baseline − shifted) / baseline; negative when shifting made things worse. */
  relativeReduction: number;
  /** Positions (0–23) that received flexible energy, in selection order. */
  targetHours: readonly number[];
  flexibleEnergyKwh: number;
  strategy: ShiftStrategyId;
  notes: readonly string[];
}

import type { CiSource, ShiftStrategyId } from '../schema/ScenarioInputV1';

// ─── Defaults ─────────────────────────────────────────────────────────────────

export interface ScenarioSettings {
  ciSource: CiSource;
  strategy: ShiftStrategyId;
  dailyEnergy: number;
  flexibleShare: number;
  targetHourCount: number;
}

/** Starting values for the control panel (14 kWh ≈ a typical UK household day). */
export const SCENARIO_DEFAULTS: ScenarioSettings = {
  ciSource: 'historical',
  strategy: 'low_intensity',
  dailyEnergy: 14,
  flexibleShare: 0.3,
  targetHourCount: 4,
};

export interface ControlRange {
  min: number;
  max: number;
  step: number;
}

/**
 * UI-level slider ranges. The engine accepts the wider domains
 * (dailyEnergy > 0, flexibleShare ∈ [0, 1], targetHourCount ∈ [1, 24]).
 */
export const SCENARIO_CONTROL_RANGES = {
  dailyEnergy: { min: 5, max: 30, step: 0.5 },
  flexibleShare: { min: 0, max: 0.8, step: 0.05 },
  targetHourCount: { min: 1, max: 8, step: 1 },
} as const satisfies Record<'dailyEnergy' | 'flexibleShare' | 'targetHourCount', ControlRange>;

/** Rows before this UTC date are dropped when the datasets are aligned. */
export const DATA_CUTOFF_DATE = '2020-01-01';

/** Date shown on first load when it lies inside the available range. */
export const PREFERRED_DEFAULT_DATE = '2024-02-05';

// ─── Labels ───────────────────────────────────────────────────────────────────

export const CI_SOURCE_LABELS: Record<CiSource, { option: string; caption: string }> = {
  historical: { option: 'Historical (actual)', caption: 'Historical carbon intensity' },
  predicted: { option: 'Model prediction', caption: 'Model-predicted carbon intensity' },
};

export const STRATEGY_LABELS: Record<ShiftStrategyId, string> = {
  low_intensity: 'Lowest-intensity hours',
  max_renewable: 'Highest-renewables hours',
};

import type { CiSource, ShiftStrategyId } from '../engine/schema/ScenarioInputV1';

export interface ScenarioMetricV1 {
  id: 'baseline_total' | 'shifted_total' | 'relative_reduction';
  label: string;
  /** Formatted value string including units, e.g. "2783 gCO₂". */
  value: string;
}

export interface LoadChartRowV1 {
  /** "HH:MM" (UTC). */
  label: string;
  baselineKwh: number;
  shiftedKwh: number;
  isTarget: boolean;
}

export interface IntensityChartRowV1 {
  label: string;
  intensityGPerKwh: number;
  baselineEmissionsG: number;
  shiftedEmissionsG: number;
}

/** View model consumed by the charts and metric tiles for one simulated day. */
export interface ScenarioOutputV1 {
  date: string;
  ciSource: CiSource;
  strategy: ShiftStrategyId;
  metrics: [ScenarioMetricV1, ScenarioMetricV1, ScenarioMetricV1];
  caption: string;
  loadChart: LoadChartRowV1[];
  intensityChart: IntensityChartRowV1[];
  /** Target hours in chronological order, "HH:MM". */
  targetHourLabels: string[];
  notes: string[];
}

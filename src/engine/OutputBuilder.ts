import type { ScenarioOutputV1 } from '../contracts/ScenarioOutputV1';
import { CI_SOURCE_LABELS, STRATEGY_LABELS } from './config/scenarioDefaults';
import { utcHourLabel } from './modules/DayExtractor';
import type { DayScenarioRequest, ScenarioResult } from './schema/ScenarioInputV1';

export function formatGrams(grams: number): string {
  return `${grams.toFixed(0)} gCO₂`;
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)} %`;
}

export function buildCaption(request: DayScenarioRequest): string {
  return (
    `${CI_SOURCE_LABELS[request.ciSource].caption} · ` +
    `Strategy: ${STRATEGY_LABELS[request.strategy].toLowerCase()} · ` +
    `Daily load: ${request.dailyEnergy.toFixed(1)} kWh · ` +
    `Flexible: ${(request.flexibleShare * 100).toFixed(0)}%`
  );
}

/**
 * Build the ScenarioOutputV1 view model from an engine result.
 * Pure: the same result and request always give the same output.
 */
export function buildScenarioOutputV1(result: ScenarioResult, request: DayScenarioRequest): ScenarioOutputV1 {
  const labels = result.timestamps.map(utcHourLabel);
  const targetSet = new Set(result.targetHours);

  return {
    date: request.date,
    ciSource: request.ciSource,
    strategy: result.strategy,
    metrics: [
      { id: 'baseline_total', label: 'Total baseline emissions', value: formatGrams(result.totalBaselineEmissions) },
      { id: 'shifted_total', label: 'Total shifted emissions', value: formatGrams(result.totalShiftedEmissions) },
      { id: 'relative_reduction', label: 'Relative reduction', value: formatPercent(result.relativeReduction) },
    ],
    caption: buildCaption(request),
    loadChart: labels.map((label, h) => ({
      label,
      baselineKwh: result.baselineLoad[h],
      shiftedKwh: result.shiftedLoad[h],
      isTarget: targetSet.has(h),
    })),
    intensityChart: labels.map((label, h) => ({
      label,
      intensityGPerKwh: result.ci[h],
      baselineEmissionsG: result.baselineEmissions[h],
      shiftedEmissionsG: result.shiftedEmissions[h],
    })),
    targetHourLabels: [...result.targetHours].sort((a, b) => a - b).map(h => labels[h]),
    notes: [...result.notes],
  };
}

import { describe, it, expect } from 'vitest';
import { runShiftScenario } from '../modules/ShiftScenarioModule';
import { buildCaption, buildScenarioOutputV1, formatGrams, formatPercent } from '../OutputBuilder';
import type { DayScenarioRequest } from '../schema/ScenarioInputV1';
import { CI_LOW_NIGHT, toSeries } from './fixtures';

const request: DayScenarioRequest = {
  date: '2024-02-05',
  ciSource: 'historical',
  strategy: 'low_intensity',
  dailyEnergy: 14,
  flexibleShare: 0.3,
  targetHourCount: 4,
};

describe('formatting helpers', () => {
  it('formats grams with no decimals', () => {
    expect(formatGrams(2783.44)).toBe('2783 gCO₂');
  });

  it('formats a fraction as a two-decimal percentage', () => {
    expect(formatPercent(0.19438)).toBe('19.44 %');
    expect(formatPercent(-0.05)).toBe('-5.00 %');
  });
});

describe('buildCaption', () => {
  it('describes a historical low-intensity run', () => {
    expect(buildCaption(request)).toBe(
      'Historical carbon intensity · Strategy: lowest-intensity hours · Daily load: 14.0 kWh · Flexible: 30%',
    );
  });

  it('describes a predicted max-renewable run', () => {
    expect(
      buildCaption({ ...request, ciSource: 'predicted', strategy: 'max_renewable', dailyEnergy: 7.5, flexibleShare: 0.5 }),
    ).toBe('Model-predicted carbon intensity · Strategy: highest-renewables hours · Daily load: 7.5 kWh · Flexible: 50%');
  });
});

describe('buildScenarioOutputV1', () => {
  const result = runShiftScenario({
    ci: toSeries('2024-02-05', CI_LOW_NIGHT),
    dailyEnergy: 14,
    flexibleShare: 0.3,
    strategy: 'low_intensity',
    targetHourCount: 4,
  });
  const output = buildScenarioOutputV1(result, request);

  it('exposes the three summary metrics in display order', () => {
    expect(output.metrics.map(m => m.id)).toEqual(['baseline_total', 'shifted_total', 'relative_reduction']);
    expect(output.metrics[0].value).toBe(formatGrams(result.totalBaselineEmissions));
    expect(output.metrics[2].value).toBe(formatPercent(result.relativeReduction));
  });

  it('labels 24 chart rows by UTC hour', () => {
    expect(output.loadChart).toHaveLength(24);
    expect(output.loadChart[0].label).toBe('00:00');
    expect(output.intensityChart[23].label).toBe('23:00');
  });

  it('marks target hours on the load chart', () => {
    const marked = output.loadChart.filter(r => r.isTarget).map(r => r.label);
    expect(marked).toEqual(['02:00', '03:00', '04:00', '05:00']);
    expect(output.targetHourLabels).toEqual(['02:00', '03:00', '04:00', '05:00']);
  });

  it('carries load, intensity and emissions per hour', () => {
    expect(output.loadChart[3]).toEqual({
      label: '03:00',
      baselineKwh: result.baselineLoad[3],
      shiftedKwh: result.shiftedLoad[3],
      isTarget: true,
    });
    expect(output.intensityChart[18]).toEqual({
      label: '18:00',
      intensityGPerKwh: 400,
      baselineEmissionsG: result.baselineEmissions[18],
      shiftedEmissionsG: result.shiftedEmissions[18],
    });
  });

  it('copies the notes so later additions do not touch the result', () => {
    output.notes.push('extra');
    expect(result.notes).toHaveLength(2);
  });
});

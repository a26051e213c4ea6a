import {
  DegenerateBaselineError,
  IncompleteDayError,
  InvalidParameterError,
  InvalidSeriesLengthError,
  MissingInputError,
} from '../errors';
import {
  HOURS_PER_DAY,
  type HourlySeries,
  type ScenarioResult,
  type ShiftScenarioInput,
} from '../schema/ScenarioInputV1';
import { sortByTimestamp, timestampMs, utcDateKey, utcHourLabel } from './DayExtractor';
import { makeProfileSeries } from './HouseholdProfileModule';
import { getStrategy } from './ShiftStrategies';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function sum(values: readonly number[]): number {
  return values.reduce((acc, v) => acc + v, 0);
}

function validateParameters(input: ShiftScenarioInput): void {
  if (!Number.isFinite(input.dailyEnergy) || input.dailyEnergy <= 0) {
    throw new InvalidParameterError('dailyEnergy', input.dailyEnergy, 'a finite number > 0 kWh');
  }
  if (!(input.flexibleShare >= 0 && input.flexibleShare <= 1)) {
    throw new InvalidParameterError('flexibleShare', input.flexibleShare, 'within [0, 1]');
  }
  if (
    !Number.isInteger(input.targetHourCount) ||
    input.targetHourCount < 1 ||
    input.targetHourCount > HOURS_PER_DAY
  ) {
    throw new InvalidParameterError('targetHourCount', input.targetHourCount, 'an integer in [1, 24]');
  }
}

const MS_PER_HOUR = 3_600_000;

/** Sorted timestamps must run 00:00 to 23:00 of one UTC day, one hour apart. */
function assertHourlyDay(timestamps: readonly string[]): void {
  const instants = timestamps.map(timestampMs);
  if (!Number.isFinite(instants[0]) || utcHourLabel(timestamps[0]) !== '00:00') {
    throw new IncompleteDayError(
      Number.isFinite(instants[0]) ? utcDateKey(timestamps[0]) : timestamps[0],
      timestamps.length,
      `ci must start at 00:00 UTC, starts at ${timestamps[0]}`,
    );
  }
  for (let h = 1; h < instants.length; h++) {
    if (instants[h] - instants[h - 1] !== MS_PER_HOUR) {
      throw new IncompleteDayError(
        utcDateKey(timestamps[0]),
        timestamps.length,
        `ci must be hourly without gaps, ${timestamps[h]} follows ${timestamps[h - 1]}`,
      );
    }
  }
}

function assertFinite(seriesName: string, values: readonly number[], timestamps: readonly string[]): void {
  values.forEach((value, h) => {
    if (!Number.isFinite(value)) {
      throw new InvalidParameterError(`${seriesName} at ${timestamps[h]}`, value, 'a finite number');
    }
  });
}

/** Re-index the renewable share onto the sorted CI timestamps. */
function alignRenewableShare(renewableShare: HourlySeries | undefined, timestamps: readonly string[]): number[] {
  if (!renewableShare) {
    throw new MissingInputError("renewableShare is required for the 'max_renewable' strategy");
  }
  if (renewableShare.length !== HOURS_PER_DAY) {
    throw new InvalidSeriesLengthError('renewableShare', renewableShare.length);
  }
  const byInstant = new Map(renewableShare.map(p => [timestampMs(p.timestamp), p.value]));
  return timestamps.map(ts => {
    const value = byInstant.get(timestampMs(ts));
    if (value === undefined) {
      throw new MissingInputError(`renewableShare has no value for ${ts}`);
    }
    return value;
  });
}

// ─── Main Module ──────────────────────────────────────────────────────────────

/**
 * ShiftScenarioModule – single-day household load-shifting simulation.
 *
 * 1. Baseline load = canonical household profile scaled to `dailyEnergy`.
 * 2. Split each hour into non-flexible (1 − f) and flexible (f) parts.
 * 3. Pick `targetHourCount` hours with the chosen strategy.
 * 4. Spread the total flexible energy evenly over those hours.
 * 5. Emissions = load × carbon intensity, hour by hour, before and after.
 *
 * Total shifted energy equals total baseline energy. Pure and deterministic:
 * tie-breaks follow timestamp order.
 */
export function runShiftScenario(input: ShiftScenarioInput): ScenarioResult {
  if (input.ci.length !== HOURS_PER_DAY) {
    throw new InvalidSeriesLengthError('ci', input.ci.length);
  }
  const strategy = getStrategy(input.strategy);
  validateParameters(input);

  // ── 1. Sort and align ─────────────────────────────────────────────────────
  const sortedCi = sortByTimestamp(input.ci);
  const timestamps = sortedCi.map(p => p.timestamp);
  const ci = sortedCi.map(p => p.value);
  assertHourlyDay(timestamps);
  assertFinite('ci', ci, timestamps);
  const renewableShare = strategy.requiresRenewableShare
    ? alignRenewableShare(input.renewableShare, timestamps)
    : undefined;
  if (renewableShare) {
    assertFinite('renewableShare', renewableShare, timestamps);
  }

  // ── 2. Baseline and split ─────────────────────────────────────────────────
  const baselineLoad = makeProfileSeries(input.dailyEnergy, timestamps).map(p => p.value);
  const f = input.flexibleShare;
  const nonFlexLoad = baselineLoad.map(kwh => kwh * (1 - f));
  const flexibleEnergyKwh = sum(baselineLoad.map(kwh => kwh * f));

  // ── 3. Target hours ───────────────────────────────────────────────────────
  const targetHours = strategy.selectTargetHours({ ci, renewableShare }, input.targetHourCount);
  const targetSet = new Set(targetHours);

  // ── 4. Redistribute ───────────────────────────────────────────────────────
  const perHourKwh = flexibleEnergyKwh / targetHours.length;
  const shiftedLoad = nonFlexLoad.map((kwh, h) => (targetSet.has(h) ? kwh + perHourKwh : kwh));

  // ── 5. Emissions ──────────────────────────────────────────────────────────
  const baselineEmissions = baselineLoad.map((kwh, h) => kwh * ci[h]);
  const shiftedEmissions = shiftedLoad.map((kwh, h) => kwh * ci[h]);
  const totalBaselineEmissions = sum(baselineEmissions);
  const totalShiftedEmissions = sum(shiftedEmissions);

  if (!Number.isFinite(totalBaselineEmissions) || totalBaselineEmissions === 0) {
    throw new DegenerateBaselineError(totalBaselineEmissions);
  }
  const relativeReduction = (totalBaselineEmissions - totalShiftedEmissions) / totalBaselineEmissions;

  const notes: string[] = [
    `Target hours (${strategy.id}): ${[...targetHours].sort((a, b) => a - b).map(h => utcHourLabel(timestamps[h])).join(', ')}.`,
    `Shifted ${flexibleEnergyKwh.toFixed(2)} kWh of flexible load; ${perHourKwh.toFixed(3)} kWh added per target hour.`,
  ];
  if (relativeReduction < 0) {
    notes.push('Shifting increased total emissions for this day.');
  }

  return {
    timestamps,
    ci,
    baselineLoad,
    nonFlexLoad,
    shiftedLoad,
    baselineEmissions,
    shiftedEmissions,
    totalBaselineEmissions,
    totalShiftedEmissions,
    relativeReduction,
    targetHours,
    flexibleEnergyKwh,
    strategy: strategy.id,
    notes,
  };
}

import type { ScenarioOutputV1 } from '../contracts/ScenarioOutputV1';
import { isScenarioError, type ScenarioError } from './errors';
import { extractDay } from './modules/DayExtractor';
import { countClippedHours, renewableShare } from './modules/RenewableShareModule';
import { runShiftScenario } from './modules/ShiftScenarioModule';
import { selectIntensitySeries, type AlignedDataset } from './normalizer/DatasetNormalizer';
import { buildScenarioOutputV1 } from './OutputBuilder';
import type { DayScenarioRequest } from './schema/ScenarioInputV1';

export type DayEvaluation =
  | { status: 'ok'; output: ScenarioOutputV1 }
  | { status: 'error'; error: ScenarioError; message: string };

/**
 * Day pipeline: slice both datasets to `request.date`, resolve the CI source,
 * derive the renewable share, run the shift scenario and build the view model.
 * Scenario errors propagate to the caller.
 */
export function runDayScenario(dataset: AlignedDataset, request: DayScenarioRequest): ScenarioOutputV1 {
  const generationDay = extractDay(dataset.generation, request.date);
  const intensityDay = extractDay(dataset.intensity, request.date);

  const ci = selectIntensitySeries(intensityDay, request.ciSource);
  const share = renewableShare(generationDay);

  const result = runShiftScenario({
    ci,
    dailyEnergy: request.dailyEnergy,
    flexibleShare: request.flexibleShare,
    strategy: request.strategy,
    renewableShare: share,
    targetHourCount: request.targetHourCount,
  });

  const output = buildScenarioOutputV1(result, request);
  const clipped = countClippedHours(generationDay);
  if (clipped > 0) {
    output.notes.push(`Renewable share clipped to [0, 1] in ${clipped} hour(s).`);
  }
  return output;
}

/**
 * Presentation boundary around runDayScenario. Scenario errors become a
 * message for that day's render; anything else is rethrown.
 */
export function evaluateDay(dataset: AlignedDataset, request: DayScenarioRequest): DayEvaluation {
  try {
    return { status: 'ok', output: runDayScenario(dataset, request) };
  } catch (error) {
    if (!isScenarioError(error)) throw error;
    const prefix = error.code === 'incomplete_day' || error.code === 'dataset_format'
      ? `Could not load a complete day for ${request.date}`
      : `Scenario could not be evaluated for ${request.date}`;
    return { status: 'error', error, message: `${prefix}: ${error.message}` };
  }
}

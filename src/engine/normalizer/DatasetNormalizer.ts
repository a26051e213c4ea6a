import { z } from 'zod';
import { DATA_CUTOFF_DATE } from '../config/scenarioDefaults';
import { DatasetFormatError, IncompleteDayError, isScenarioError, type ScenarioError } from '../errors';
import { sortByTimestamp, timestampMs, utcDateKey } from '../modules/DayExtractor';
import {
  GenerationMixRowSchema,
  IntensityRowSchema,
  type CiSource,
  type GenerationMixRow,
  type HourlySeries,
  type IntensityRow,
  type TimestampedRow,
} from '../schema/ScenarioInputV1';

export interface AlignedDataset {
  generation: GenerationMixRow[];
  intensity: IntensityRow[];
  /** UTC date keys with at least one aligned row, ascending. */
  availableDates: string[];
}

export type DatasetLoad =
  | { status: 'ok'; dataset: AlignedDataset }
  | { status: 'error'; error: ScenarioError; message: string };

export interface AlignOptions {
  /** `YYYY-MM-DD`; rows before midnight UTC of this date are dropped. */
  cutoffDate?: string;
}

// ─── Parsing ──────────────────────────────────────────────────────────────────

function parseRows<S extends z.ZodTypeAny>(dataset: string, schema: S, raw: unknown): z.infer<S>[] {
  const result = z.array(schema).safeParse(raw);
  if (!result.success) {
    throw new DatasetFormatError(
      dataset,
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

export function parseGenerationMixRows(raw: unknown): GenerationMixRow[] {
  return parseRows('generation-mix', GenerationMixRowSchema, raw);
}

export function parseIntensityRows(raw: unknown): IntensityRow[] {
  return parseRows('carbon-intensity', IntensityRowSchema, raw);
}

// ─── Alignment ────────────────────────────────────────────────────────────────

/** Sorted, post-cutoff, first row per instant. */
function tidy<T extends TimestampedRow>(rows: ReadonlyArray<T>, cutoffMs: number): T[] {
  const seen = new Set<number>();
  return sortByTimestamp(rows).filter(row => {
    const t = timestampMs(row.timestamp);
    if (t < cutoffMs || seen.has(t)) return false;
    seen.add(t);
    return true;
  });
}

/**
 * Put the generation-mix and carbon-intensity datasets on one hourly index.
 *
 * Steps: sort → drop rows before the cutoff → drop duplicate instants (first
 * wins) → keep only instants present in both datasets.
 */
export function alignDatasets(
  generation: ReadonlyArray<GenerationMixRow>,
  intensity: ReadonlyArray<IntensityRow>,
  options: AlignOptions = {},
): AlignedDataset {
  const cutoffMs = timestampMs(`${options.cutoffDate ?? DATA_CUTOFF_DATE}T00:00:00Z`);
  const gen = tidy(generation, cutoffMs);
  const ci = tidy(intensity, cutoffMs);

  const genInstants = new Set(gen.map(row => timestampMs(row.timestamp)));
  const ciInstants = new Set(ci.map(row => timestampMs(row.timestamp)));

  const alignedIntensity = ci.filter(row => genInstants.has(timestampMs(row.timestamp)));
  const alignedGeneration = gen.filter(row => ciInstants.has(timestampMs(row.timestamp)));

  const availableDates = [...new Set(alignedIntensity.map(row => utcDateKey(row.timestamp)))];

  return { generation: alignedGeneration, intensity: alignedIntensity, availableDates };
}

/**
 * Parse and align a `{ generation, intensity }` payload, reporting bad data as
 * a value so the caller can render it.
 */
export function loadDataset(
  raw: { generation: unknown; intensity: unknown },
  options: AlignOptions = {},
): DatasetLoad {
  try {
    const dataset = alignDatasets(
      parseGenerationMixRows(raw.generation),
      parseIntensityRows(raw.intensity),
      options,
    );
    return { status: 'ok', dataset };
  } catch (error) {
    if (!isScenarioError(error)) throw error;
    return { status: 'error', error, message: `Could not load the grid dataset: ${error.message}` };
  }
}

/**
 * `preferred` when it lies within the available range, else the earliest
 * available date. Dates are `YYYY-MM-DD`, so string order is date order.
 */
export function resolveDefaultDate(availableDates: readonly string[], preferred: string): string | undefined {
  if (availableDates.length === 0) return undefined;
  const min = availableDates[0];
  const max = availableDates[availableDates.length - 1];
  return preferred >= min && preferred <= max ? preferred : min;
}

// ─── Carbon-intensity source ──────────────────────────────────────────────────

const CI_COLUMN: Record<CiSource, 'CI_actual' | 'CI_pred'> = {
  historical: 'CI_actual',
  predicted: 'CI_pred',
};

/** The CI_actual or CI_pred column of a day slice as an hourly series. */
export function selectIntensitySeries(dayRows: ReadonlyArray<IntensityRow>, ciSource: CiSource): HourlySeries {
  const column = CI_COLUMN[ciSource];
  return dayRows.map(row => {
    const value = row[column];
    if (value === null || !Number.isFinite(value)) {
      throw new IncompleteDayError(
        utcDateKey(row.timestamp),
        dayRows.length,
        `${column} is missing at ${row.timestamp}`,
      );
    }
    return { timestamp: row.timestamp, value };
  });
}

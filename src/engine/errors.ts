/**
 * Scenario error taxonomy.
 *
 * Every error is raised at the point of detection and scoped to a single
 * scenario evaluation. The presentation layer (see `evaluateDay` in Engine.ts)
 * turns them into a user-facing message; nothing here is fatal to the process.
 */

export type ScenarioErrorCode =
  | 'incomplete_day'
  | 'invalid_series_length'
  | 'missing_input'
  | 'invalid_strategy'
  | 'degenerate_baseline'
  | 'invalid_parameter'
  | 'dataset_format';

export abstract class ScenarioError extends Error {
  abstract readonly code: ScenarioErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A calendar day did not yield exactly 24 aligned hourly rows. */
export class IncompleteDayError extends ScenarioError {
  readonly code = 'incomplete_day' as const;

  constructor(
    readonly dateKey: string,
    readonly rowCount: number,
    detail?: string,
  ) {
    super(detail ?? `Expected 24 rows for ${dateKey}, got ${rowCount}`);
  }
}

export class InvalidSeriesLengthError extends ScenarioError {
  readonly code = 'invalid_series_length' as const;

  constructor(
    readonly seriesName: string,
    readonly actualLength: number,
  ) {
    super(`${seriesName} must contain exactly 24 hourly values, got ${actualLength}`);
  }
}

export class MissingInputError extends ScenarioError {
  readonly code = 'missing_input' as const;
}

export class InvalidStrategyError extends ScenarioError {
  readonly code = 'invalid_strategy' as const;

  constructor(readonly token: string) {
    super(`Unknown shifting strategy '${token}': expected 'low_intensity' or 'max_renewable'`);
  }
}

/** Total baseline emissions is zero, so the relative reduction is undefined. */
export class DegenerateBaselineError extends ScenarioError {
  readonly code = 'degenerate_baseline' as const;

  constructor(readonly totalBaselineEmissions: number) {
    super(
      `Total baseline emissions is ${totalBaselineEmissions} gCO₂; ` +
      'relative reduction is undefined for an all-zero intensity or load day',
    );
  }
}

export class InvalidParameterError extends ScenarioError {
  readonly code = 'invalid_parameter' as const;

  constructor(
    readonly parameter: string,
    readonly value: number,
    expected: string,
  ) {
    super(`${parameter} must be ${expected}, got ${value}`);
  }
}

export class DatasetFormatError extends ScenarioError {
  readonly code = 'dataset_format' as const;

  constructor(
    readonly dataset: string,
    readonly issues: string[],
  ) {
    super(`Invalid ${dataset} dataset: ${issues.join('; ')}`);
  }
}

export function isScenarioError(value: unknown): value is ScenarioError {
  return value instanceof ScenarioError;
}

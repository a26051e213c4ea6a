import { InvalidStrategyError } from '../errors';
import type { ShiftStrategyId } from '../schema/ScenarioInputV1';

/** Per-hour ranking inputs, already aligned to the sorted timestamp index. */
export interface StrategyContext {
  ci: readonly number[];
  /** Present whenever the strategy declares `requiresRenewableShare`. */
  renewableShare?: readonly number[];
}

export interface ShiftStrategyDefinition {
  id: ShiftStrategyId;
  requiresRenewableShare: boolean;
  /** Positions of the `count` best hours, best first. */
  selectTargetHours(context: StrategyContext, count: number): number[];
}

/**
 * Positions ordered by `values`, ties broken by position (stable).
 * `direction` 1 = ascending, -1 = descending.
 */
export function rankPositions(values: readonly number[], direction: 1 | -1): number[] {
  return values
    .map((value, position) => ({ value, position }))
    .sort((a, b) => direction * (a.value - b.value) || a.position - b.position)
    .map(({ position }) => position);
}

// ─── Registry ─────────────────────────────────────────────────────────────────

/**
 * Closed strategy registry. Adding a ShiftStrategyId variant without an entry
 * here is a compile error.
 */
export const SHIFT_STRATEGIES: Record<ShiftStrategyId, ShiftStrategyDefinition> = {
  low_intensity: {
    id: 'low_intensity',
    requiresRenewableShare: false,
    selectTargetHours: ({ ci }, count) => rankPositions(ci, 1).slice(0, count),
  },
  max_renewable: {
    id: 'max_renewable',
    requiresRenewableShare: true,
    selectTargetHours: ({ renewableShare }, count) => {
      if (!renewableShare) {
        throw new Error('max_renewable: renewable share was not aligned before selection.');
      }
      return rankPositions(renewableShare, -1).slice(0, count);
    },
  },
};

function isShiftStrategyId(token: string): token is ShiftStrategyId {
  return Object.prototype.hasOwnProperty.call(SHIFT_STRATEGIES, token);
}

/** Registry lookup for tokens from untyped sources (URL params, JSON). */
export function parseStrategy(token: string): ShiftStrategyId {
  const normalised = token.trim().toLowerCase().replace(/-/g, '_');
  if (!isShiftStrategyId(normalised)) {
    throw new InvalidStrategyError(token);
  }
  return normalised;
}

export function getStrategy(id: string): ShiftStrategyDefinition {
  return SHIFT_STRATEGIES[parseStrategy(id)];
}

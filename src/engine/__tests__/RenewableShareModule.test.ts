import { describe, it, expect } from 'vitest';
import {
  countClippedHours,
  hourlyRenewableShare,
  renewableShare,
} from '../modules/RenewableShareModule';
import type { GenerationMixRow } from '../schema/ScenarioInputV1';

describe('hourlyRenewableShare', () => {
  it('returns the plain ratio inside [0, 1]', () => {
    expect(hourlyRenewableShare(50, 100)).toBe(0.5);
  });

  it('clips RENEWABLE=120, GENERATION=100 to exactly 1.0', () => {
    expect(hourlyRenewableShare(120, 100)).toBe(1);
  });

  it('clips negative renewables to 0', () => {
    expect(hourlyRenewableShare(-5, 100)).toBe(0);
  });

  it('treats zero generation as 0 share', () => {
    expect(hourlyRenewableShare(0, 0)).toBe(0);
    expect(hourlyRenewableShare(40, 0)).toBe(0);
  });

  it('treats negative generation as 0 share', () => {
    expect(hourlyRenewableShare(40, -10)).toBe(0);
  });

  it('never passes NaN or Infinity through', () => {
    expect(hourlyRenewableShare(Number.NaN, 100)).toBe(0);
    expect(hourlyRenewableShare(50, Number.NaN)).toBe(0);
    expect(hourlyRenewableShare(Number.POSITIVE_INFINITY, 100)).toBe(0);
  });
});

describe('renewableShare', () => {
  const day: GenerationMixRow[] = [
    { timestamp: '2024-02-05T00:00:00Z', RENEWABLE: 30, GENERATION: 100 },
    { timestamp: '2024-02-05T01:00:00Z', RENEWABLE: 120, GENERATION: 100 },
    { timestamp: '2024-02-05T02:00:00Z', RENEWABLE: 10, GENERATION: 0 },
  ];

  it('keeps each row timestamp and computes the clipped share', () => {
    expect(renewableShare(day)).toEqual([
      { timestamp: '2024-02-05T00:00:00Z', value: 0.3 },
      { timestamp: '2024-02-05T01:00:00Z', value: 1 },
      { timestamp: '2024-02-05T02:00:00Z', value: 0 },
    ]);
  });

  it('counts hours whose raw ratio had to be clipped or guarded', () => {
    expect(countClippedHours(day)).toBe(2);
  });
});

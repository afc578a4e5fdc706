/**
 * Result Helpers
 *
 * Convenience functions for reading simulation results.
 */

import type { SimulationResult, Timeline, TimelineEntry } from './simulation.js';
import type { PopulationSnapshot } from './modules/population.js';
import { Age, Count, Gender, Year } from './framework/types.js';
import { sum } from './primitives/math.js';

/**
 * Total population of a timeline entry.
 */
export function entryTotal(entry: TimelineEntry): Count {
  return entry.males + entry.females;
}

/**
 * Get the timeline entry for a specific year.
 *
 * @returns TimelineEntry or undefined if year not in range
 */
export function getAtYear(timeline: Timeline, year: Year): TimelineEntry | undefined {
  const first = timeline[0];
  if (first === undefined) return undefined;
  // Years are contiguous, so the entry sits at a fixed offset
  const entry = timeline[year - first.year];
  return entry?.year === year ? entry : undefined;
}

/**
 * Total population in `year`.
 *
 * @throws RangeError if the year was not simulated
 */
export function totalAtYear(timeline: Timeline, year: Year): Count {
  const entry = getAtYear(timeline, year);
  if (entry === undefined) {
    throw new RangeError(`Year ${year} is outside the timeline`);
  }
  return entryTotal(entry);
}

/**
 * First and last recorded year.
 */
export function yearRange(timeline: Timeline): { first: Year; last: Year } {
  const first = timeline[0];
  const last = timeline[timeline.length - 1];
  if (first === undefined || last === undefined) {
    throw new RangeError('Timeline is empty');
  }
  return { first: first.year, last: last.year };
}

/**
 * Extract totals as parallel arrays (for plotting).
 */
export function extractTimeSeries(
  timeline: Timeline
): { years: Year[]; males: Count[]; females: Count[]; totals: Count[] } {
  return {
    years: timeline.map(e => e.year),
    males: timeline.map(e => e.males),
    females: timeline.map(e => e.females),
    totals: timeline.map(entryTotal),
  };
}

// =============================================================================
// SNAPSHOTS
// =============================================================================

export function countAll(population: PopulationSnapshot): Count {
  return sum(population.males) + sum(population.females);
}

export function countGender(population: PopulationSnapshot, gender: Gender): Count {
  return sum(gender === 'male' ? population.males : population.females);
}

export function countAge(population: PopulationSnapshot, age: Age): Count {
  return countAgeGender(population, age, 'male') + countAgeGender(population, age, 'female');
}

/**
 * Count for one (age, gender) bucket; 0 outside the tracked ages.
 */
export function countAgeGender(population: PopulationSnapshot, age: Age, gender: Gender): Count {
  const counts = gender === 'male' ? population.males : population.females;
  return counts[age] ?? 0;
}

// =============================================================================
// SUMMARY
// =============================================================================

export interface SimulationSummary {
  finalPopulation: Count;
  /** Mean completed fertility of the trimmed cohorts; null when none qualify */
  completedFertility: number | null;
}

export function summarize(result: SimulationResult): SimulationSummary {
  const { cohortFertility } = result;
  return {
    finalPopulation: countAll(result.finalPopulation),
    completedFertility: cohortFertility.size > 0 ? cohortFertility.avg() : null,
  };
}

/**
 * Result Helper Tests
 */

import {
  getAtYear,
  totalAtYear,
  yearRange,
  entryTotal,
  extractTimeSeries,
  countAll,
  countGender,
  countAge,
  countAgeGender,
  summarize,
} from './helpers.js';
import { run } from './simulation.js';
import type { Timeline } from './simulation.js';
import type { PopulationSnapshot } from './modules/population.js';
import { GENDERS } from './framework/types.js';
import { test, expect, printSummary } from './test-utils.js';

console.log('\n=== Helper Tests ===\n');

const timeline: Timeline = [
  { year: 0, males: 50, females: 50 },
  { year: 1, males: 52, females: 51 },
  { year: 2, males: 55, females: 53 },
];

const population: PopulationSnapshot = {
  males: [3, 2, 1, 0],
  females: [4, 2, 0, 0],
};

// =============================================================================
// TIMELINE
// =============================================================================

test('entryTotal adds both genders', () => {
  expect(entryTotal(timeline[1])).toBe(103);
});

test('getAtYear finds entries by year', () => {
  expect(getAtYear(timeline, 2)).toEqual({ year: 2, males: 55, females: 53 });
  expect(getAtYear(timeline, 3)).toBeUndefined();
  expect(getAtYear(timeline, -1)).toBeUndefined();
  expect(getAtYear([], 0)).toBeUndefined();
});

test('totalAtYear throws outside the timeline', () => {
  expect(totalAtYear(timeline, 0)).toBe(100);
  expect(() => totalAtYear(timeline, 7)).toThrow(RangeError, 'Year 7');
});

test('yearRange reports the first and last year', () => {
  expect(yearRange(timeline)).toEqual({ first: 0, last: 2 });
  expect(() => yearRange([])).toThrow(RangeError);
});

test('extractTimeSeries returns parallel arrays', () => {
  const series = extractTimeSeries(timeline);
  expect(series.years).toEqual([0, 1, 2]);
  expect(series.males).toEqual([50, 52, 55]);
  expect(series.females).toEqual([50, 51, 53]);
  expect(series.totals).toEqual([100, 103, 108]);
});

// =============================================================================
// SNAPSHOTS
// =============================================================================

test('snapshot counts', () => {
  expect(countAll(population)).toBe(12);
  expect(countGender(population, 'male')).toBe(6);
  expect(countGender(population, 'female')).toBe(6);
  expect(countAge(population, 0)).toBe(7);
  expect(countAgeGender(population, 1, 'female')).toBe(2);
});

test('gender counts add up to the total', () => {
  const total = GENDERS.reduce((acc, gender) => acc + countGender(population, gender), 0);
  expect(total).toBe(countAll(population));
});

test('ages outside the snapshot count as zero', () => {
  expect(countAgeGender(population, 10, 'male')).toBe(0);
  expect(countAge(population, 200)).toBe(0);
});

// =============================================================================
// SUMMARY
// =============================================================================

test('summarize reports the final population', () => {
  const result = run({
    initialPopulation: 1_000_000,
    nYears: 20,
    maxAge: 100,
    malesPer100Females: 105,
    targetTotalFertilityRate: 2,
    infantMortalityRate: 0.005,
  });
  const summary = summarize(result);
  expect(summary.finalPopulation).toBe(entryTotal(result.timeline[20]));
  expect(summary.completedFertility).toBe(null);
});

printSummary();

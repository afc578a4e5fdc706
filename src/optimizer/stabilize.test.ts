/**
 * Stabilization Tests
 *
 * Window/slope arithmetic on hand-built timelines, then the optimizers on
 * real runs. The reference scenario is the slowest test in the suite.
 */

import {
  growthWindow,
  growthRate,
  stabilityCost,
  stabilize,
  stabilizeByFeedback,
  solve,
  TFR_BOUNDS,
} from './stabilize.js';
import { populationModule } from '../modules/population.js';
import { run, Timeline } from '../simulation.js';
import { countAll, totalAtYear } from '../helpers.js';
import { ConfigurationError } from '../framework/errors.js';
import { test, expect, printSummary } from '../test-utils.js';

console.log('\n=== Stabilization Tests ===\n');

/** Timeline with the given totals, split evenly between genders */
function timelineOf(totals: number[]): Timeline {
  return totals.map((total, year) => ({ year, males: total / 2, females: total / 2 }));
}

// =============================================================================
// GROWTH WINDOW
// =============================================================================

test('window spans the second half of a surviving run', () => {
  // 0..10, growing by 10 per year
  const timeline = timelineOf(Array.from({ length: 11 }, (_, year) => 900 + 10 * year));
  const window = growthWindow(timeline, 900);
  expect(window.firstYear).toBe(0);
  expect(window.halfwayYear).toBe(5);
  expect(window.endYear).toBe(10);
  expect(window.halfwayTotal).toBe(950);
  expect(window.endTotal).toBe(1000);
  expect(window.slope).toBe(10);
});

test('window ends when the population falls to a third', () => {
  const timeline = timelineOf([900, 800, 700, 600, 500, 400, 300, 200, 100]);
  const window = growthWindow(timeline, 900);
  // 300 <= floor(900 / 3) first at year 6
  expect(window.endYear).toBe(6);
  expect(window.halfwayYear).toBe(3);
  expect(window.slope).toBe(-100);
});

test('halfway year rounds down', () => {
  const timeline = timelineOf([100, 100, 100, 100, 100, 100, 100, 106]);
  const window = growthWindow(timeline, 100);
  expect(window.halfwayYear).toBe(3);
  // (106 - 100) / (7 - 3)
  expect(window.slope).toBe(1.5);
});

test('an immediate collapse gives a zero-length window', () => {
  const window = growthWindow(timelineOf([30, 20]), 100);
  expect(window.endYear).toBe(0);
  expect(window.halfwayYear).toBe(0);
  expect(window.slope).toBe(0);
  expect(growthRate(window)).toBe(0);
});

test('growth rate is logarithmic per year', () => {
  const timeline = timelineOf([1000, 1000, 1000, 1000, 2000]);
  expect(growthRate(growthWindow(timeline, 1000))).toBeCloseTo(Math.log(2) / 2, 12);
});

test('growth rate treats extinction as one person', () => {
  const timeline = timelineOf([1000, 1000, 0]);
  expect(growthRate(growthWindow(timeline, 1000))).toBeCloseTo(-Math.log(1000), 12);
});

// =============================================================================
// COST
// =============================================================================

const quick = populationModule.mergeParams({ initialPopulation: 1_000_000_000, nYears: 600, maxAge: 100 });

test('cost is zero-seeking: far-off rates cost more', () => {
  const near = stabilityCost(quick, 2.06);
  expect(stabilityCost(quick, 1.5)).toBeGreaterThan(near);
  expect(stabilityCost(quick, 2.6)).toBeGreaterThan(near);
});

test('cost clamps the candidate rate', () => {
  expect(stabilityCost(quick, 4)).toBe(stabilityCost(quick, TFR_BOUNDS.max));
  expect(stabilityCost(quick, -1)).toBe(stabilityCost(quick, 0));
});

// =============================================================================
// SIMPLEX SEARCH
// =============================================================================

test('reference scenario stabilizes near replacement', () => {
  const params = populationModule.mergeParams({
    initialPopulation: 10_000_000_000,
    nYears: 2000,
    maxAge: 120,
    malesPer100Females: 105,
    infantMortalityRate: 0.005,
    targetTotalFertilityRate: 2.06406,
  });
  const result = stabilize(params);
  const tfr = result.parameters.targetTotalFertilityRate;
  expect(tfr).toBeBetween(2.0, 2.2);
  expect(result.converged).toBeTrue();

  // The young starting age structure lifts the population by over a
  // quarter in the first century; from then on it stays level.
  const { timeline, finalPopulation } = run(result.parameters);
  const final = countAll(finalPopulation);
  const window = growthWindow(timeline, params.initialPopulation);
  const afterMomentum = totalAtYear(timeline, 100);
  expect(Math.abs(final - afterMomentum) / afterMomentum).toBeLessThan(0.05);
  expect(Math.abs(final - window.halfwayTotal) / window.halfwayTotal).toBeLessThan(0.05);
  expect(final / params.initialPopulation).toBeBetween(1.2, 1.35);
});

test('only the fertility rate changes', () => {
  const result = stabilize(quick, { maxIterations: 5 });
  expect({ ...result.parameters, targetTotalFertilityRate: quick.targetTotalFertilityRate }).toEqual(quick);
});

test('an exhausted budget still returns the best rate so far', () => {
  const result = stabilize(quick, { maxIterations: 2 });
  expect(result.converged).toBeFalse();
  expect(result.terminationReason).toBe('max-iterations');
  expect(result.iterations).toBe(2);
  expect(result.parameters.targetTotalFertilityRate).toBeBetween(TFR_BOUNDS.min, TFR_BOUNDS.max);
  expect(result.cost).toBeLessThan(stabilityCost(quick, 1.5));
});

test('solve returns the stabilized parameters', () => {
  const params = { ...quick, nYears: 300 };
  expect(solve(params)).toEqual(stabilize(params).parameters);
});

test('invalid parameters are rejected', () => {
  expect(() => stabilize({ ...quick, infantMortalityRate: -0.5 })).toThrow(ConfigurationError);
  expect(() => stabilizeByFeedback({ ...quick, maxAge: -3 })).toThrow(ConfigurationError);
});

/** Run `fn` with console.warn captured */
function captureWarnings(fn: () => void): string[] {
  const warnings: string[] = [];
  const original = console.warn;
  console.warn = (...args: unknown[]) => {
    warnings.push(args.map(String).join(' '));
  };
  try {
    fn();
  } finally {
    console.warn = original;
  }
  return warnings;
}

test('parameter warnings are printed once per search, not per run', () => {
  const shortLived = { ...quick, initialPopulation: 1_000_000, nYears: 300, maxAge: 40 };
  const simplex = captureWarnings(() => {
    stabilize(shortLived, { maxIterations: 5 });
  });
  expect(simplex).toHaveLength(1);
  expect(simplex[0]).toBe('[population] Warning: maxAge 40 is below the oldest fertile age 49; older mothers never occur');

  const feedback = captureWarnings(() => {
    stabilizeByFeedback(shortLived, { maxIterations: 5 });
  });
  expect(feedback).toHaveLength(1);
});

// =============================================================================
// FEEDBACK LOOP
// =============================================================================

test('feedback loop settles on a stable rate', () => {
  const result = stabilizeByFeedback({ ...quick, targetTotalFertilityRate: 1.9 });
  expect(result.converged).toBeTrue();
  expect(result.parameters.targetTotalFertilityRate).toBeBetween(1.9, 2.3);
  expect(result.evaluations).toBe(result.iterations + 1);
});

test('feedback loop agrees with the simplex search', () => {
  const feedback = stabilizeByFeedback(quick).parameters.targetTotalFertilityRate;
  const simplex = stabilize(quick).parameters.targetTotalFertilityRate;
  expect(Math.abs(feedback - simplex)).toBeLessThan(0.01);
});

test('feedback loop reports an exhausted budget', () => {
  const result = stabilizeByFeedback({ ...quick, targetTotalFertilityRate: 1.5 }, { maxIterations: 1 });
  expect(result.converged).toBeFalse();
  expect(result.iterations).toBe(1);
  expect(result.parameters.targetTotalFertilityRate).toBeGreaterThan(1.5);
});

printSummary();

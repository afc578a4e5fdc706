/**
 * Cohort Fertility Ledger Tests
 */

import { CohortFertility, cohortRatio } from './cohort-fertility.js';
import { NoDataError } from '../framework/errors.js';
import { test, expect, printSummary } from '../test-utils.js';

console.log('\n=== Cohort Fertility Tests ===\n');

function ledger(): CohortFertility {
  const cohorts = new CohortFertility();
  cohorts.addFemales(5, 100);
  cohorts.addBirths(5, 150);
  cohorts.addBirths(5, 60);
  cohorts.addFemales(-20, 40);
  cohorts.addBirths(-20, 80);
  cohorts.addFemales(0, 50);
  cohorts.addBirths(0, 100);
  return cohorts;
}

test('births and females accumulate per birth year', () => {
  const cohorts = ledger();
  expect(cohorts.get(5)).toEqual({ females: 100, births: 210 });
  expect(cohorts.size).toBe(3);
});

test('births may arrive before the cohort has females', () => {
  const cohorts = new CohortFertility();
  cohorts.addBirths(-3, 7);
  expect(cohorts.get(-3)).toEqual({ females: 0, births: 7 });
});

test('entries are sorted by birth year, negative years first', () => {
  const cohorts = ledger();
  expect(cohorts.years()).toEqual([-20, 0, 5]);
  expect(cohorts.entries()).toEqual([
    { year: -20, females: 40, births: 80 },
    { year: 0, females: 50, births: 100 },
    { year: 5, females: 100, births: 210 },
  ]);
});

test('toJSON serializes sorted records', () => {
  expect(JSON.stringify(ledger())).toBe(
    '[{"year":-20,"females":40,"births":80},{"year":0,"females":50,"births":100},{"year":5,"females":100,"births":210}]'
  );
});

test('ratio is births per female', () => {
  const cohorts = ledger();
  expect(cohorts.ratio(5)).toBeCloseTo(2.1, 12);
  expect(cohorts.ratio(-20)).toBe(2);
  expect(cohortRatio({ females: 4, births: 3 })).toBe(0.75);
});

test('ratio of a cohort without females is an error', () => {
  expect(() => cohortRatio({ females: 0, births: 3 })).toThrow(NoDataError);
});

test('ratio of an unknown year is an error', () => {
  expect(() => ledger().ratio(1)).toThrow(NoDataError, 'year 1');
});

test('avg is the mean of the per-cohort ratios', () => {
  // (2 + 2 + 2.1) / 3
  expect(ledger().avg()).toBeCloseTo(6.1 / 3, 12);
});

test('avg of an empty ledger is an error', () => {
  expect(() => new CohortFertility().avg()).toThrow(NoDataError);
});

test('retainRange keeps both bounds', () => {
  const trimmed = ledger().retainRange(-20, 0);
  expect(trimmed.years()).toEqual([-20, 0]);
  expect(trimmed.get(-20)).toEqual({ females: 40, births: 80 });
});

test('retainRange copies rather than shares cohorts', () => {
  const cohorts = ledger();
  const trimmed = cohorts.retainRange(0, 10);
  trimmed.addBirths(0, 1);
  expect(cohorts.get(0)).toEqual({ females: 50, births: 100 });
  expect(trimmed.get(0)).toEqual({ females: 50, births: 101 });
});

test('an inverted range retains nothing', () => {
  const trimmed = ledger().retainRange(100, -50);
  expect(trimmed.size).toBe(0);
  expect(trimmed.entries()).toEqual([]);
});

printSummary();

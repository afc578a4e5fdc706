/**
 * Population Module
 *
 * Single-year-of-age cohort model split by gender. Each step:
 *   1. everyone ages one year (top bucket first, so nothing is read after
 *      it has been overwritten)
 *   2. women of fertile age give birth; births are credited to the
 *      mother's own birth cohort
 *   3. every bucket loses its expected deaths
 *
 * All transitions are rounded expectations, never random draws: the
 * optimizer needs the same parameters to give the same trajectory.
 *
 * Outputs (per year):
 * - males, females: totals after the year
 * - newborns, maleNewborns: births during the year
 * - deaths: deaths during the year
 */

import { defineModule, Module } from '../framework/module.js';
import { Age, Count, ValidationIssue, ValidationResult, Year } from '../framework/types.js';
import { validatedMerge } from '../framework/validated-merge.js';
import { saturatingSubtract, sum } from '../primitives/math.js';
import { CohortFertility } from './cohort-fertility.js';
import { DemographicTables, FERTILE_AGES, standardTables } from './tables.js';

// =============================================================================
// PARAMETERS
// =============================================================================

export interface PopulationParams {
  initialPopulation: Count;          // People alive at year 0
  nYears: number;                    // Years to simulate
  maxAge: Age;                       // Nobody survives past this age
  malesPer100Females: number;        // Sex ratio at birth
  targetTotalFertilityRate: number;  // Children per woman over a full fertile life
  infantMortalityRate: number;       // Probability of dying in the first year
}

export const populationDefaults: PopulationParams = {
  initialPopulation: 10_000_000_000,
  nYears: 2_000,
  maxAge: 120,
  malesPer100Females: 105,
  targetTotalFertilityRate: 2.06406,
  infantMortalityRate: 0.005,
};

// =============================================================================
// STATE
// =============================================================================

export interface PopulationState {
  maxAge: Age;
  /** Head counts indexed by age, 0..maxAge+1 (maxAge+1 is the overflow bucket) */
  males: Float64Array;
  females: Float64Array;
  cohorts: CohortFertility;
  // Cached per-run rates, indexed by age
  _maleBirthBias: number;
  _birthRates: Float64Array;
  _maleDeathRates: Float64Array;
  _femaleDeathRates: Float64Array;
}

/**
 * Population by age at one instant, one array per gender indexed by age
 */
export interface PopulationSnapshot {
  males: readonly Count[];
  females: readonly Count[];
}

// =============================================================================
// OUTPUTS
// =============================================================================

export interface PopulationOutputs {
  males: Count;
  females: Count;
  newborns: Count;
  maleNewborns: Count;
  deaths: Count;
}

// =============================================================================
// VALIDATION
// =============================================================================

function isCount(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/** Rough generation length in years, for the growth estimate below */
const GENERATION_YEARS = 30;

/**
 * Whether the population could outgrow the integers a double holds exactly,
 * taking each generation to multiply it by TFR / 2.
 */
function exceedsExactCounts(p: PopulationParams): boolean {
  const growth = (p.nYears / GENERATION_YEARS) * Math.log(p.targetTotalFertilityRate / 2);
  return Math.log(p.initialPopulation) + growth > Math.log(Number.MAX_SAFE_INTEGER);
}

export function validatePopulationParams(params: Partial<PopulationParams>): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: string[] = [];
  const p = { ...populationDefaults, ...params };

  if (!isCount(p.initialPopulation)) {
    errors.push({ field: 'initialPopulation', message: `${p.initialPopulation} must be a non-negative integer` });
  }
  if (!isCount(p.nYears)) {
    errors.push({ field: 'nYears', message: `${p.nYears} must be a non-negative integer` });
  }
  if (!Number.isInteger(p.maxAge) || p.maxAge < 1) {
    errors.push({ field: 'maxAge', message: `${p.maxAge} must be an integer >= 1` });
  } else if (p.maxAge < FERTILE_AGES.max) {
    warnings.push(`maxAge ${p.maxAge} is below the oldest fertile age ${FERTILE_AGES.max}; older mothers never occur`);
  }
  if (!isCount(p.malesPer100Females)) {
    errors.push({ field: 'malesPer100Females', message: `${p.malesPer100Females} must be a non-negative integer` });
  }
  if (!Number.isFinite(p.targetTotalFertilityRate) || p.targetTotalFertilityRate < 0) {
    errors.push({ field: 'targetTotalFertilityRate', message: `${p.targetTotalFertilityRate} must be a finite number >= 0` });
  }
  if (!(p.infantMortalityRate >= 0 && p.infantMortalityRate <= 1)) {
    errors.push({ field: 'infantMortalityRate', message: `${p.infantMortalityRate} outside valid range [0, 1]` });
  }
  if (errors.length === 0 && exceedsExactCounts(p)) {
    warnings.push(
      `TFR ${p.targetTotalFertilityRate} over ${p.nYears} years may grow the population past ` +
      `${Number.MAX_SAFE_INTEGER}; counts beyond that are no longer exact`
    );
  }

  return { valid: errors.length === 0, errors, warnings };
}

// =============================================================================
// YEARLY PHASES
// =============================================================================

/**
 * Shift every bucket up one year of age. The overflow bucket at maxAge + 1
 * receives the oldest cohort, which the death phase then removes.
 */
export function propagateAge(state: PopulationState): void {
  const { males, females } = state;
  for (let age = state.maxAge; age >= 0; age--) {
    males[age + 1] = males[age];
    males[age] = 0;
    females[age + 1] = females[age];
    females[age] = 0;
  }
}

/**
 * Add this year's newborns to age 0. Each age's births are credited to the
 * cohort the mothers were born in; the newborn girls open the cohort of `year`.
 */
export function handleBirths(
  state: PopulationState,
  year: Year
): { newborns: Count; maleNewborns: Count } {
  const { females, cohorts, _birthRates: rates } = state;
  let newborns = 0;

  for (let age = 0; age < females.length; age++) {
    const rate = rates[age];
    if (rate === 0) continue;
    const births = Math.round(rate * females[age]);
    if (births > 0) {
      cohorts.addBirths(year - age, births);
      newborns += births;
    }
  }

  // Girls take the rounding residual
  const maleNewborns = Math.round(newborns * state._maleBirthBias);
  const femaleNewborns = newborns - maleNewborns;

  state.males[0] += maleNewborns;
  females[0] += femaleNewborns;
  cohorts.addFemales(year, femaleNewborns);

  return { newborns, maleNewborns };
}

function applyDeaths(counts: Float64Array, rates: Float64Array): Count {
  let deaths = 0;
  for (let age = 0; age < counts.length; age++) {
    const count = counts[age];
    if (count === 0) continue;
    const expected = Math.round(count * rates[age]);
    const remaining = saturatingSubtract(count, expected);
    deaths += count - remaining;
    counts[age] = remaining;
  }
  return deaths;
}

/**
 * Remove expected deaths from every bucket. Death is certain at maxAge and above.
 */
export function handleDeaths(state: PopulationState): Count {
  return applyDeaths(state.males, state._maleDeathRates) +
    applyDeaths(state.females, state._femaleDeathRates);
}

/**
 * Copy the current counts out of the state.
 */
export function snapshot(state: PopulationState): PopulationSnapshot {
  return {
    males: Array.from(state.males),
    females: Array.from(state.females),
  };
}

// =============================================================================
// MODULE DEFINITION
// =============================================================================

function ratesByAge(bucketCount: number, rate: (age: Age) => number): Float64Array {
  const rates = new Float64Array(bucketCount);
  for (let age = 0; age < bucketCount; age++) {
    rates[age] = rate(age);
  }
  return rates;
}

/**
 * Build the population module over a set of demographic tables.
 */
export function createPopulationModule(
  tables: DemographicTables
): Module<PopulationParams, PopulationState, PopulationOutputs> {
  return defineModule({
    name: 'population',
    description: 'Single-year-of-age cohort projection by gender',

    defaults: populationDefaults,

    paramMeta: {
      initialPopulation: {
        description: 'People alive at the start of the simulation',
        unit: 'people',
        range: { min: 1e3, max: 1e13, default: 1e10 },
        tier: 1,
        integer: true,
        logarithmic: true,
      },
      nYears: {
        description: 'Number of years to simulate',
        unit: 'years',
        range: { min: 0, max: 10_000, default: 2_000 },
        tier: 1,
        integer: true,
      },
      maxAge: {
        description: 'Age at which death is certain',
        unit: 'years',
        range: { min: FERTILE_AGES.max, max: 254, default: 120 },
        tier: 2,
        integer: true,
      },
      malesPer100Females: {
        description: 'Sex ratio at birth',
        unit: 'boys per 100 girls',
        range: { min: 80, max: 120, default: 105 },
        tier: 1,
        integer: true,
      },
      infantMortalityRate: {
        description: 'Probability that a newborn dies in its first year',
        unit: 'probability',
        range: { min: 0.001, max: 0.020, default: 0.005 },
        tier: 1,
      },
      targetTotalFertilityRate: {
        description: 'Children per woman over a full fertile life. ~2.06 keeps the population stable.',
        unit: 'children/woman',
        range: { min: 0, max: 3, default: 2.06406 },
        tier: 1,
      },
    },

    outputs: ['males', 'females', 'newborns', 'maleNewborns', 'deaths'] as const,

    validate: validatePopulationParams,

    mergeParams(partial: Partial<PopulationParams>): PopulationParams {
      return validatedMerge(
        'population',
        validatePopulationParams,
        (p) => ({ ...populationDefaults, ...p }),
        partial
      );
    },

    init(params: PopulationParams): PopulationState {
      const { maxAge, infantMortalityRate } = params;
      const bucketCount = maxAge + 2;
      const males = new Float64Array(bucketCount);
      const females = new Float64Array(bucketCount);

      for (let age = 0; age < bucketCount; age++) {
        // Even split between genders
        const countEach = Math.trunc(tables.ageDistribution(age, maxAge) * params.initialPopulation * 0.5);
        males[age] = countEach;
        females[age] = countEach;
      }

      return {
        maxAge,
        males,
        females,
        cohorts: new CohortFertility(),
        _maleBirthBias: params.malesPer100Females / (params.malesPer100Females + 100),
        _birthRates: ratesByAge(bucketCount, age => tables.birthProbability(age, params.targetTotalFertilityRate)),
        _maleDeathRates: ratesByAge(bucketCount, age => tables.deathProbability(age, 'male', maxAge, infantMortalityRate)),
        _femaleDeathRates: ratesByAge(bucketCount, age => tables.deathProbability(age, 'female', maxAge, infantMortalityRate)),
      };
    },

    observe(state: PopulationState): PopulationOutputs {
      return {
        males: sum(state.males),
        females: sum(state.females),
        newborns: 0,
        maleNewborns: 0,
        deaths: 0,
      };
    },

    step(state, _params, year) {
      propagateAge(state);
      const { newborns, maleNewborns } = handleBirths(state, year);
      const deaths = handleDeaths(state);

      return {
        males: sum(state.males),
        females: sum(state.females),
        newborns,
        maleNewborns,
        deaths,
      };
    },
  });
}

export const populationModule = createPopulationModule(standardTables);

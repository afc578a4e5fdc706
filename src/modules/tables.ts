/**
 * Demographic Tables
 *
 * Fixed lookup functions for the population module:
 * - initial age structure (relative frequency per year of age)
 * - nominal age-specific fertility, rescaled to a target TFR
 * - annual death probability by age and gender
 *
 * Pure data, no state.
 */

import { Age, Gender } from '../framework/types.js';

/** Ages at which women can give birth (inclusive) */
export const FERTILE_AGES = { min: 15, max: 49 } as const;

/**
 * Age-dependent probabilities consumed by the population module.
 * Swappable per run so alternative mortality/fertility schedules can be tried.
 */
export interface DemographicTables {
  /** Relative frequency of a single year of age in the initial population */
  ageDistribution(age: Age, maxAge: Age): number;
  /** Annual probability that a woman of `age` gives birth */
  birthProbability(age: Age, targetTFR: number): number;
  /** Annual probability of death */
  deathProbability(age: Age, gender: Gender, maxAge: Age, infantMortalityRate: number): number;
}

// =============================================================================
// AGE DISTRIBUTION
// =============================================================================

/**
 * Per-year share of the initial population. Each band's share is spread
 * evenly over its years: 0-14 25%, 15-24 16%, 25-54 41%, 55-64 9%, 65+ 9%.
 */
export function ageDistribution(age: Age, maxAge: Age): number {
  if (age > maxAge) return 0;
  if (age <= 14) return 0.25 / 15;  // ~1.67% per year
  if (age <= 24) return 0.16 / 10;  // 1.6% per year
  if (age <= 54) return 0.41 / 30;  // ~1.37% per year
  if (age <= 64) return 0.09 / 10;  // 0.9% per year
  return 0.09 / 56;                 // ~0.16% per year
}

// =============================================================================
// FERTILITY
// =============================================================================

/**
 * Nominal age-specific fertility curve, peaking at 25-29.
 */
export function nominalBirthProbability(age: Age): number {
  if (age < 15) return 0;
  if (age <= 19) return 0.04;
  if (age <= 24) return 0.10;
  if (age <= 29) return 0.13;
  if (age <= 34) return 0.12;
  if (age <= 39) return 0.08;
  if (age <= 44) return 0.03;
  if (age <= 49) return 0.005;
  return 0;
}

function nominalTotalFertility(): number {
  let sum = 0;
  for (let age = 0; age <= 255; age++) {
    sum += nominalBirthProbability(age);
  }
  return sum;
}

/** Total fertility implied by the nominal curve (children per woman) */
export const NOMINAL_TFR = nominalTotalFertility();

/**
 * Nominal curve rescaled so that it sums to `targetTFR` over all ages.
 */
export function birthProbability(age: Age, targetTFR: number): number {
  return (nominalBirthProbability(age) * targetTFR) / NOMINAL_TFR;
}

// =============================================================================
// MORTALITY
// =============================================================================

/** Life table band: applies from `from` up to the next band */
interface MortalityBand {
  from: Age;
  male: number;
  female: number;
}

// Ages 1+; age 0 is the caller's infant mortality rate
const MORTALITY_BANDS: readonly MortalityBand[] = [
  { from: 1, male: 0.00039, female: 0.00030 },
  { from: 2, male: 0.00020, female: 0.00015 },
  { from: 5, male: 0.00013, female: 0.00010 },
  { from: 10, male: 0.00010, female: 0.00008 },
  { from: 15, male: 0.00022, female: 0.00018 },
  { from: 20, male: 0.00074, female: 0.00060 },
  { from: 25, male: 0.00097, female: 0.00080 },
  { from: 30, male: 0.00107, female: 0.00090 },
  { from: 35, male: 0.00127, female: 0.00110 },
  { from: 40, male: 0.00174, female: 0.00150 },
  { from: 45, male: 0.00261, female: 0.00220 },
  { from: 50, male: 0.00422, female: 0.00350 },
  { from: 55, male: 0.00689, female: 0.00570 },
  { from: 60, male: 0.01135, female: 0.00940 },
  { from: 65, male: 0.01871, female: 0.01550 },
  { from: 70, male: 0.03066, female: 0.02540 },
  { from: 75, male: 0.05027, female: 0.04160 },
  { from: 80, male: 0.08096, female: 0.06700 },
  { from: 85, male: 0.13257, female: 0.10970 },
  { from: 90, male: 0.20755, female: 0.17100 },
  { from: 95, male: 0.31234, female: 0.25500 },
  { from: 100, male: 0.43622, female: 0.36000 },
];

function mortalityBand(age: Age): MortalityBand {
  let band = MORTALITY_BANDS[0];
  for (const candidate of MORTALITY_BANDS) {
    if (candidate.from > age) break;
    band = candidate;
  }
  return band;
}

/**
 * Annual death probability. Anyone at or above `maxAge` dies with
 * certainty, which also empties the overflow bucket at maxAge + 1.
 */
export function deathProbability(
  age: Age,
  gender: Gender,
  maxAge: Age,
  infantMortalityRate: number
): number {
  if (age >= maxAge) return 1.0;
  if (age === 0) return infantMortalityRate;
  return mortalityBand(age)[gender];
}

/**
 * The built-in tables.
 */
export const standardTables: DemographicTables = {
  ageDistribution,
  birthProbability,
  deathProbability,
};

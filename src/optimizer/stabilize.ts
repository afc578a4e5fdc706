/**
 * Population Stabilization
 *
 * Finds the target fertility rate at which the long-run population neither
 * grows nor shrinks. A full simulation is the cost function, so the search
 * is derivative-free:
 *
 * - stabilize(): Nelder-Mead on slope², where slope is the average yearly
 *   change in population over the second half of the run
 * - stabilizeByFeedback(): proportional-integral loop on the log growth
 *   rate over the same window; cheaper, less exact
 *
 * Both return the input parameters with only targetTotalFertilityRate replaced.
 */

import { Count, Year } from '../framework/types.js';
import { clamp } from '../primitives/math.js';
import { entryTotal, totalAtYear, yearRange } from '../helpers.js';
import { PopulationParams, populationModule } from '../modules/population.js';
import { DemographicTables } from '../modules/tables.js';
import { run, Timeline } from '../simulation.js';
import { minimize, NelderMeadOptions, TerminationReason } from './nelder-mead.js';

// =============================================================================
// TYPES
// =============================================================================

/** Fertility rates the search may try */
export const TFR_BOUNDS = { min: 0, max: 3 } as const;

/**
 * The part of a timeline used to judge stability
 */
export interface GrowthWindow {
  firstYear: Year;
  /** Midpoint between firstYear and endYear */
  halfwayYear: Year;
  /** First year the population is down to a third of its start, else the last year */
  endYear: Year;
  halfwayTotal: Count;
  endTotal: Count;
  /** Average change in total population per year between halfwayYear and endYear */
  slope: number;
}

export interface StabilizationResult {
  parameters: PopulationParams;
  converged: boolean;
  iterations: number;
  /** Simulations run */
  evaluations: number;
  /** slope² at the returned fertility rate */
  cost: number;
  terminationReason: TerminationReason;
}

interface CommonOptions {
  /** Alternative fertility/mortality tables for every run */
  tables?: DemographicTables;
  /** Log every evaluation */
  verbose?: boolean;
}

export interface StabilizeOptions extends CommonOptions, Pick<NelderMeadOptions, 'maxIterations' | 'sdTolerance'> {
  /** Half-width of the initial simplex around the starting rate (default 0.05) */
  initialStep?: number;
}

export interface FeedbackOptions extends CommonOptions {
  /** Gain on the change in growth rate since the last iteration (default 5) */
  proportionalGain?: number;
  /** Gain on the growth rate itself (default 35) */
  integralGain?: number;
  /** Converged once |growth rate| per year falls below this (default 1e-6) */
  tolerance?: number;
  /** Iteration cap (default 200) */
  maxIterations?: number;
}

// =============================================================================
// COST FUNCTION
// =============================================================================

/**
 * Locate the stability window in a timeline and measure its slope.
 */
export function growthWindow(timeline: Timeline, initialPopulation: Count): GrowthWindow {
  const { first: firstYear, last } = yearRange(timeline);
  const threshold = Math.floor(initialPopulation / 3);

  const collapse = timeline.find(entry => entryTotal(entry) <= threshold);
  const endYear = collapse?.year ?? last;
  const halfwayYear = Math.trunc((endYear - firstYear) / 2);

  const halfwayTotal = totalAtYear(timeline, halfwayYear);
  const endTotal = totalAtYear(timeline, endYear);
  const years = endYear - halfwayYear;

  return {
    firstYear,
    halfwayYear,
    endYear,
    halfwayTotal,
    endTotal,
    slope: years > 0 ? (endTotal - halfwayTotal) / years : 0,
  };
}

/**
 * Log growth rate per year over the window; extinct endpoints count as one person.
 */
export function growthRate(window: GrowthWindow): number {
  const years = window.endYear - window.halfwayYear;
  if (years <= 0) return 0;
  return Math.log(Math.max(window.endTotal, 1) / Math.max(window.halfwayTotal, 1)) / years;
}

/**
 * Run the simulation with `tfr` (clamped to TFR_BOUNDS) and measure its growth window.
 * `params` must come from `populationModule.mergeParams`; they are not validated again.
 */
export function evaluateFertility(
  params: PopulationParams,
  tfr: number,
  options: CommonOptions = {}
): GrowthWindow {
  const candidate = { ...params, targetTotalFertilityRate: clamp(tfr, TFR_BOUNDS.min, TFR_BOUNDS.max) };
  const { timeline } = run(candidate, { tables: options.tables, prevalidated: true });
  const window = growthWindow(timeline, candidate.initialPopulation);

  if (options.verbose) {
    console.log(
      `[stabilize] tfr=${candidate.targetTotalFertilityRate.toFixed(6)}, ` +
      `halfway=${window.halfwayTotal}, end=${window.endTotal}, ` +
      `years=${window.endYear - window.halfwayYear}, slope=${window.slope.toExponential(4)}`
    );
  }

  return window;
}

/**
 * slope² for a candidate fertility rate. Growth and decline are penalized alike.
 * `params` must already be merged and validated.
 */
export function stabilityCost(params: PopulationParams, tfr: number, options: CommonOptions = {}): number {
  const { slope } = evaluateFertility(params, tfr, options);
  return slope * slope;
}

// =============================================================================
// SIMPLEX SEARCH
// =============================================================================

/**
 * Search for the fertility rate giving zero long-run growth, starting
 * from the rate in `params`. Running out of iterations is reported
 * through `converged`, not thrown.
 *
 * @throws ConfigurationError if a parameter is invalid
 */
export function stabilize(params: PopulationParams, options: StabilizeOptions = {}): StabilizationResult {
  const base = populationModule.mergeParams(params);
  const { initialStep = 0.05, maxIterations, sdTolerance, ...common } = options;
  const tfr = base.targetTotalFertilityRate;

  const result = minimize(
    ([x]) => stabilityCost(base, x, common),
    [[tfr - initialStep], [tfr + initialStep]],
    {
      ...(maxIterations !== undefined ? { maxIterations } : {}),
      ...(sdTolerance !== undefined ? { sdTolerance } : {}),
    }
  );

  const [best] = result.best;
  return {
    parameters: { ...base, targetTotalFertilityRate: clamp(best, TFR_BOUNDS.min, TFR_BOUNDS.max) },
    converged: result.converged,
    iterations: result.iterations,
    evaluations: result.evaluations,
    cost: result.bestCost,
    terminationReason: result.terminationReason,
  };
}

/**
 * Parameters with the stabilizing fertility rate substituted.
 */
export function solve(params: PopulationParams): PopulationParams {
  return stabilize(params).parameters;
}

// =============================================================================
// FEEDBACK LOOP
// =============================================================================

/**
 * Proportional-integral controller: nudges the fertility rate against the
 * measured growth rate until it is within `tolerance` of zero.
 *
 * @throws ConfigurationError if a parameter is invalid
 */
export function stabilizeByFeedback(params: PopulationParams, options: FeedbackOptions = {}): StabilizationResult {
  const base = populationModule.mergeParams(params);
  const {
    proportionalGain = 5,
    integralGain = 35,
    tolerance = 1e-6,
    maxIterations = 200,
    ...common
  } = options;

  let tfr = clamp(base.targetTotalFertilityRate, TFR_BOUNDS.min, TFR_BOUNDS.max);
  let window = evaluateFertility(base, tfr, common);
  let rate = growthRate(window);
  let evaluations = 1;
  let iterations = 0;

  let previousRate = rate;

  while (Math.abs(rate) >= tolerance && iterations < maxIterations) {
    const correction = proportionalGain * (rate - previousRate) + integralGain * rate;
    tfr = clamp(tfr - correction, TFR_BOUNDS.min, TFR_BOUNDS.max);
    previousRate = rate;
    window = evaluateFertility(base, tfr, common);
    rate = growthRate(window);
    evaluations++;
    iterations++;
  }

  const converged = Math.abs(rate) < tolerance;
  return {
    parameters: { ...base, targetTotalFertilityRate: tfr },
    converged,
    iterations,
    evaluations,
    cost: window.slope * window.slope,
    terminationReason: converged ? 'converged' : 'max-iterations',
  };
}

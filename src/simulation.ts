/**
 * Simulation Runner
 *
 * Runs the population module for `nYears` steps and packages the result:
 * initial and final age structure, the yearly male/female timeline, and
 * the completed-fertility ledger of cohorts that lived their whole fertile
 * span inside the run.
 */

import { defineSimulation, init, SimulationProblem, Stepper } from './framework/problem.js';
import { Count, Year } from './framework/types.js';
import { CohortFertility } from './modules/cohort-fertility.js';
import {
  createPopulationModule,
  populationModule,
  PopulationOutputs,
  PopulationParams,
  PopulationSnapshot,
  PopulationState,
  snapshot,
} from './modules/population.js';
import { DemographicTables } from './modules/tables.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TimelineEntry {
  year: Year;
  males: Count;
  females: Count;
}

/** One entry per simulated year, 0..=nYears */
export type Timeline = readonly TimelineEntry[];

export interface SimulationResult {
  readonly initialPopulation: PopulationSnapshot;
  readonly finalPopulation: PopulationSnapshot;
  /** Cohorts born in [COHORT_MARGIN, nYears - COHORT_MARGIN] */
  readonly cohortFertility: CohortFertility;
  readonly timeline: Timeline;
}

export interface SimulationOptions {
  /** Replace the built-in fertility/mortality tables */
  tables?: DemographicTables;
  /** `params` already came out of `mergeParams`: skip validation and its warnings */
  prevalidated?: boolean;
}

export type PopulationProblem = SimulationProblem<PopulationParams, PopulationState, PopulationOutputs>;
export type PopulationStepper = Stepper<PopulationState, PopulationOutputs>;

/**
 * Cohorts born within this many years of either end of a run have not
 * completed (or not started) their fertile years inside it.
 */
export const COHORT_MARGIN = 100;

// =============================================================================
// PROBLEM
// =============================================================================

/**
 * Validate parameters and define a run (no computation).
 */
export function definePopulationSimulation(
  params: PopulationParams,
  options: SimulationOptions = {}
): PopulationProblem {
  const module = options.tables ? createPopulationModule(options.tables) : populationModule;
  if (options.prevalidated) {
    return { module, params, years: params.nYears };
  }
  return defineSimulation(module, params, params.nYears);
}

/**
 * Restrict the ledger to cohorts whose fertile years lie inside a run of `years` years.
 */
export function trimCohorts(cohorts: CohortFertility, years: number): CohortFertility {
  return cohorts.retainRange(COHORT_MARGIN, years - COHORT_MARGIN);
}

/**
 * Build the timeline from the stepper's yearly records.
 */
export function toTimeline(stepper: PopulationStepper): TimelineEntry[] {
  return stepper.history().map(({ year, outputs }) => ({
    year,
    males: outputs.males,
    females: outputs.females,
  }));
}

// =============================================================================
// RUN
// =============================================================================

/**
 * Run the simulation to completion.
 *
 * @throws ConfigurationError if a parameter is invalid
 */
export function run(params: PopulationParams, options: SimulationOptions = {}): SimulationResult {
  const stepper = init(definePopulationSimulation(params, options));
  const initialPopulation = snapshot(stepper.state());

  while (!stepper.done()) {
    stepper.step();
  }

  const state = stepper.state();
  return {
    initialPopulation,
    finalPopulation: snapshot(state),
    cohortFertility: trimCohorts(state.cohorts, stepper.year()),
    timeline: toTimeline(stepper),
  };
}

/**
 * Problem-Solve Separation
 *
 * Separates simulation definition from execution.
 *
 * Usage:
 *   // Define (inert - validates, no computation)
 *   const problem = defineSimulation(populationModule, params, params.nYears);
 *
 *   // Interactive step-by-step
 *   const stepper = init(problem);
 *   while (!stepper.done()) {
 *     const { year, outputs } = stepper.step();
 *     console.log(year, outputs.males + outputs.females);
 *   }
 */

import { Module } from './module.js';
import { Year } from './types.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Inert simulation definition. Holds validated configuration but performs no computation.
 */
export interface SimulationProblem<
  TParams extends object,
  TState extends object,
  TOutputs extends object
> {
  readonly module: Module<TParams, TState, TOutputs>;
  readonly params: TParams;
  /** Number of yearly steps to run */
  readonly years: number;
}

/**
 * Outputs recorded for one year
 */
export interface YearRecord<TOutputs> {
  year: Year;
  outputs: TOutputs;
}

/**
 * Step result returned on each year advance
 */
export interface StepResult<TOutputs> extends YearRecord<TOutputs> {
  done: boolean;
}

/**
 * Interactive step-by-step simulation runner
 */
export interface Stepper<TState extends object, TOutputs extends object> {
  /** Advance one year. Returns the outputs recorded at the end of it. */
  step(): StepResult<TOutputs>;
  /** Current year (next year to be stepped) */
  year(): Year;
  /** Whether the simulation has finished */
  done(): boolean;
  /** Live module state */
  state(): TState;
  /** Records for year 0 and every year stepped so far */
  history(): readonly YearRecord<TOutputs>[];
}

// =============================================================================
// DEFINE
// =============================================================================

/**
 * Define a simulation problem. Parameters are merged with the module
 * defaults and validated here, so an invalid problem never exists.
 */
export function defineSimulation<
  TParams extends object,
  TState extends object,
  TOutputs extends object
>(
  module: Module<TParams, TState, TOutputs>,
  params: Partial<TParams>,
  years: number
): SimulationProblem<TParams, TState, TOutputs> {
  const merged = module.mergeParams(params);
  if (!Number.isInteger(years) || years < 0) {
    throw new RangeError(`[${module.name}] years must be a non-negative integer, got ${years}`);
  }
  return { module, params: merged, years };
}

// =============================================================================
// INIT (STEPPER)
// =============================================================================

/**
 * Initialize a step-by-step simulation runner.
 */
export function init<
  TParams extends object,
  TState extends object,
  TOutputs extends object
>(
  problem: SimulationProblem<TParams, TState, TOutputs>
): Stepper<TState, TOutputs> {
  const { module, years } = problem;
  const params = { ...problem.params };
  const state = module.init(params);
  const records: YearRecord<TOutputs>[] = [{ year: 0, outputs: module.observe(state, params) }];
  let currentYear: Year = 0;

  return {
    step(): StepResult<TOutputs> {
      if (currentYear >= years) {
        throw new Error(`[${module.name}] Simulation already finished after ${years} years`);
      }
      const outputs = module.step(state, params, currentYear);
      currentYear++;
      const record = { year: currentYear, outputs };
      records.push(record);
      return { ...record, done: currentYear >= years };
    },

    year(): Year {
      return currentYear;
    },

    done(): boolean {
      return currentYear >= years;
    },

    state(): TState {
      return state;
    },

    history(): readonly YearRecord<TOutputs>[] {
      return records;
    },
  };
}

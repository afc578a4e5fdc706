/**
 * Module interface - the core abstraction
 *
 * Each module is a self-contained unit with:
 * - Typed parameters (validated at load time)
 * - Internal state (owned by a single run, persists across years)
 * - Declared outputs (what each year reports)
 * - Step function advancing the state by one year
 */

import { Year, ValidationResult, ParamMeta } from './types.js';

/**
 * Module definition interface
 *
 * @template TParams - Module's parameter type
 * @template TState - Module's internal state type
 * @template TOutputs - What the module reports for each year
 */
export interface Module<
  TParams extends object,
  TState extends object,
  TOutputs extends object
> {
  /** Unique module identifier */
  readonly name: string;

  /** Human-readable description */
  readonly description: string;

  /** Default parameters */
  readonly defaults: TParams;

  /**
   * Output keys - what this module reports each year
   */
  readonly outputs: readonly (keyof TOutputs)[];

  /**
   * Parameter metadata, one entry per numeric parameter.
   * Used by describeParameters() for editors and documentation.
   */
  readonly paramMeta?: Partial<Record<keyof TParams, ParamMeta>>;

  /**
   * Validate parameters
   * Called once at simulation start
   */
  validate(params: Partial<TParams>): ValidationResult;

  /**
   * Merge partial params with defaults
   */
  mergeParams(partial: Partial<TParams>): TParams;

  /**
   * Initialize state for year 0
   * Called once at simulation start
   */
  init(params: TParams): TState;

  /**
   * Outputs describing the state as it is, without advancing it.
   * Used for the year-0 record.
   */
  observe(state: TState, params: TParams): TOutputs;

  /**
   * Step function - compute one year
   *
   * Advances `state` in place. A state belongs to exactly one run.
   *
   * @param state - Current state (from previous year or init)
   * @param params - Module parameters (immutable)
   * @param year - Year being simulated (0-based)
   * @returns Outputs after the year has been applied
   */
  step(state: TState, params: TParams, year: Year): TOutputs;
}

/**
 * Helper to create a module with better type inference
 */
export function defineModule<
  TParams extends object,
  TState extends object,
  TOutputs extends object
>(
  definition: Module<TParams, TState, TOutputs>
): Module<TParams, TState, TOutputs> {
  return definition;
}

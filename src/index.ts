/**
 * stable-population - cohort population simulation and fertility stabilization
 *
 * Main entry point for programmatic use.
 */

// Simulation
export { run, definePopulationSimulation, trimCohorts, toTimeline, COHORT_MARGIN } from './simulation.js';
export type {
  SimulationResult,
  SimulationOptions,
  Timeline,
  TimelineEntry,
  PopulationProblem,
  PopulationStepper,
} from './simulation.js';

// Stabilization
export {
  solve,
  stabilize,
  stabilizeByFeedback,
  stabilityCost,
  evaluateFertility,
  growthWindow,
  growthRate,
  TFR_BOUNDS,
} from './optimizer/stabilize.js';
export type { StabilizationResult, StabilizeOptions, FeedbackOptions, GrowthWindow } from './optimizer/stabilize.js';
export { minimize } from './optimizer/nelder-mead.js';
export type { NelderMeadOptions, NelderMeadResult, Objective, Point, TerminationReason } from './optimizer/nelder-mead.js';

// Scenario loader
export { loadScenario, loadScenarioAsParams, parseScenario, scenarioToParams, listScenarios, getScenarioPath } from './scenario.js';
export type { Scenario } from './scenario.js';

// Modules (for advanced use)
export {
  populationModule,
  populationDefaults,
  createPopulationModule,
  validatePopulationParams,
  propagateAge,
  handleBirths,
  handleDeaths,
  snapshot,
} from './modules/population.js';
export type { PopulationParams, PopulationState, PopulationOutputs, PopulationSnapshot } from './modules/population.js';
export {
  standardTables,
  ageDistribution,
  birthProbability,
  nominalBirthProbability,
  deathProbability,
  NOMINAL_TFR,
  FERTILE_AGES,
} from './modules/tables.js';
export type { DemographicTables } from './modules/tables.js';
export { CohortFertility, cohortRatio } from './modules/cohort-fertility.js';
export type { CohortData, CohortRecord } from './modules/cohort-fertility.js';

// Step-by-step runs
export { defineSimulation, init } from './framework/problem.js';
export type { SimulationProblem, Stepper, StepResult, YearRecord } from './framework/problem.js';

// Parameter introspection
export { describeParameters } from './framework/introspect.js';
export type { ParameterInfo } from './framework/introspect.js';

// Result helpers
export {
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
export type { SimulationSummary } from './helpers.js';

// Errors and types
export { ConfigurationError, NoDataError } from './framework/errors.js';
export { GENDERS } from './framework/types.js';
export type { Age, Count, Gender, Year, ValidationResult, ValidationIssue, ParamMeta } from './framework/types.js';

/**
 * Scenario Loader
 *
 * Loads named parameter sets from JSON files and turns them into
 * validated simulation parameters.
 */

import { readdir, readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from './framework/errors.js';
import { PopulationParams, populationModule } from './modules/population.js';

// =============================================================================
// TYPES
// =============================================================================

/**
 * Scenario file format
 */
export interface Scenario {
  /** Human-readable name */
  name: string;

  /** Description of scenario assumptions */
  description?: string;

  /** Optional scenario metadata */
  meta?: {
    author?: string;
    source?: string;
  };

  /** Parameter overrides (all optional - only specify what differs from defaults) */
  parameters?: Partial<PopulationParams>;
}

const KNOWN_KEYS = new Set(['name', 'description', 'meta', 'parameters']);

// =============================================================================
// PARSING
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isParameterKey(key: string): key is keyof PopulationParams {
  return Object.prototype.hasOwnProperty.call(populationModule.defaults, key);
}

/**
 * Check the shape of a parsed scenario file, warning about unrecognized keys.
 *
 * @param source - File path or label used in messages
 */
export function parseScenario(raw: unknown, source: string): Scenario {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Scenario ${source} must be a JSON object`, 'scenario');
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      console.warn(`[scenario] Warning: Unrecognized scenario key "${key}" in ${source} will be ignored`);
    }
  }

  const { name, description, meta, parameters } = raw;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigurationError(`Scenario file missing required 'name' field: ${source}`, 'name');
  }

  const scenario: Scenario = { name };
  if (typeof description === 'string') scenario.description = description;
  if (isRecord(meta)) {
    scenario.meta = {
      ...(typeof meta.author === 'string' ? { author: meta.author } : {}),
      ...(typeof meta.source === 'string' ? { source: meta.source } : {}),
    };
  }

  if (parameters !== undefined) {
    if (!isRecord(parameters)) {
      throw new ConfigurationError(`Scenario ${source}: 'parameters' must be an object`, 'parameters');
    }
    scenario.parameters = parseParameters(parameters, source);
  }

  return scenario;
}

function parseParameters(raw: Record<string, unknown>, source: string): Partial<PopulationParams> {
  const parameters: Partial<PopulationParams> = {};

  for (const [key, value] of Object.entries(raw)) {
    if (!isParameterKey(key)) {
      console.warn(`[scenario] Warning: Unrecognized parameter "${key}" in ${source} will be ignored`);
      continue;
    }
    if (typeof value !== 'number') {
      throw new ConfigurationError(`Scenario ${source}: parameter '${key}' must be a number`, key);
    }
    parameters[key] = value;
  }

  return parameters;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a scenario from a JSON file
 */
export async function loadScenario(path: string): Promise<Scenario> {
  const content = await readFile(path, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Scenario ${path} is not valid JSON: ${reason}`, 'scenario');
  }
  return parseScenario(raw, path);
}

/**
 * Convert scenario to validated parameters, applying optional overrides on top
 *
 * @throws ConfigurationError if the merged parameters are invalid
 */
export function scenarioToParams(
  scenario: Scenario,
  overrides: Partial<PopulationParams> = {}
): PopulationParams {
  return populationModule.mergeParams({ ...scenario.parameters, ...overrides });
}

/**
 * Load scenario and convert to params, with optional overrides
 */
export async function loadScenarioAsParams(
  path: string,
  overrides?: Partial<PopulationParams>
): Promise<{ scenario: Scenario; params: PopulationParams }> {
  const scenario = await loadScenario(path);
  return { scenario, params: scenarioToParams(scenario, overrides) };
}

// =============================================================================
// SCENARIO LISTING
// =============================================================================

const DEFAULT_SCENARIOS_DIR = join(dirname(fileURLToPath(import.meta.url)), '../scenarios');

/**
 * List available scenarios in the scenarios directory
 */
export async function listScenarios(scenariosDir: string = DEFAULT_SCENARIOS_DIR): Promise<string[]> {
  const files = await readdir(scenariosDir);
  return files
    .filter(f => f.endsWith('.json'))
    .map(f => f.replace(/\.json$/, ''))
    .sort();
}

/**
 * Get scenario path from name
 */
export function getScenarioPath(name: string, scenariosDir: string = DEFAULT_SCENARIOS_DIR): string {
  return join(scenariosDir, `${name}.json`);
}

/**
 * Parameter Introspection
 *
 * Turns a module's `paramMeta` into a flat schema that editors and docs
 * can consume without knowing the module.
 */

import { Module } from './module.js';
import { ParamMeta } from './types.js';

export interface ParameterInfo {
  default: number;
  min?: number;
  max?: number;
  unit: string;
  description: string;
  /** module.param */
  path: string;
  integer: boolean;
  logarithmic: boolean;
}

/**
 * Generate a parameter schema from a module's paramMeta.
 * Parameters without metadata are left out.
 *
 * @param maxTier - Include parameters up to this tier (1 = user-facing only)
 * @returns Record mapping parameter names to ParameterInfo, in the order of `defaults`
 */
export function describeParameters<
  TParams extends object,
  TState extends object,
  TOutputs extends object
>(
  module: Module<TParams, TState, TOutputs>,
  maxTier: ParamMeta['tier'] = 3
): Record<string, ParameterInfo> {
  const result: Record<string, ParameterInfo> = {};
  const isParam = (key: string): key is Extract<keyof TParams, string> => key in module.defaults;

  for (const key of Object.keys(module.defaults)) {
    if (!isParam(key)) continue;
    const info = module.paramMeta?.[key];
    if (info === undefined || info.tier > maxTier) continue;
    const current: unknown = module.defaults[key];

    result[key] = {
      default: typeof current === 'number' ? current : info.range.default,
      min: info.range.min,
      max: info.range.max,
      unit: info.unit,
      description: info.description,
      path: `${module.name}.${key}`,
      integer: info.integer ?? false,
      logarithmic: info.logarithmic ?? false,
    };
  }

  return result;
}

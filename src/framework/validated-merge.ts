/**
 * Validate-on-Construct Pattern
 *
 * Parameters are validated at construction time, so invalid params
 * never reach a simulation. mergeParams() calls validate() internally.
 */

import { ValidationResult } from './types.js';
import { ConfigurationError } from './errors.js';

/**
 * Wraps a module's merge + validate into a single operation.
 * Throws ConfigurationError on validation errors, logs warnings to console.
 *
 * @param moduleName - Module name for error messages
 * @param validateFn - Module's validate function
 * @param mergeFn - Function that merges partial params with defaults
 * @param partial - Partial params to merge
 * @returns Fully merged and validated params
 */
export function validatedMerge<TParams>(
  moduleName: string,
  validateFn: (params: Partial<TParams>) => ValidationResult,
  mergeFn: (partial: Partial<TParams>) => TParams,
  partial: Partial<TParams>
): TParams {
  const merged = mergeFn(partial);

  const result = validateFn(merged);

  if (result.warnings.length > 0) {
    for (const warning of result.warnings) {
      console.warn(`[${moduleName}] Warning: ${warning}`);
    }
  }

  const [first] = result.errors;
  if (!result.valid && first !== undefined) {
    const messages = result.errors.map(e => `${e.field}: ${e.message}`);
    throw new ConfigurationError(
      `[${moduleName}] Invalid parameters:\n  ${messages.join('\n  ')}`,
      first.field,
      messages
    );
  }

  return merged;
}

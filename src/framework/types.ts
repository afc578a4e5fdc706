/**
 * Core types for the simulation framework
 */

/** Simulation year (0 = first simulated year, negative for early birth cohorts) */
export type Year = number;

/** Age in whole years */
export type Age = number;

/**
 * Non-negative integer head count. Exact up to Number.MAX_SAFE_INTEGER (2^53 - 1);
 * runs that grow past it keep going with rounded counts.
 */
export type Count = number;

export type Gender = 'male' | 'female';
export const GENDERS: readonly Gender[] = ['male', 'female'];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: string[];
}

/**
 * A single validation failure, tied to the parameter that caused it
 */
export interface ValidationIssue {
  field: string;
  message: string;
}

/**
 * Range constraint for numeric parameters
 */
export interface Range {
  min?: number;
  max?: number;
  default: number;
}

/**
 * Parameter metadata for documentation and editors
 */
export interface ParamMeta {
  description: string;
  unit: string;
  range: Range;
  tier: 1 | 2 | 3;  // 1 = user-facing, 2 = scenario, 3 = calibration
  /** Whether editors should only offer whole numbers */
  integer?: boolean;
  /** Editors should use a logarithmic scale */
  logarithmic?: boolean;
}

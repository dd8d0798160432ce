/**
 * Validation helpers for coefficients, probabilities and input records
 */

import type { ZodError } from 'zod';
import { createLogger } from '../utils/log.js';
import { RiskEngineError } from '../domain/errors.js';
import type { PresetFile } from '../domain/schemas.js';

const logger = createLogger('validation');

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function emptyResult(): ValidationResult {
  return { valid: true, errors: [], warnings: [] };
}

/**
 * Validate that a probability lies in (0, 1]
 */
export function validateProbability(value: number, name: string): ValidationResult {
  const result = emptyResult();

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    result.valid = false;
    result.errors.push(`${name} must be a finite number, got: ${value}`);
    return result;
  }

  if (value <= 0) {
    result.valid = false;
    result.errors.push(`${name} must be greater than 0: ${value}`);
  } else if (value > 1) {
    result.valid = false;
    result.errors.push(`${name} cannot exceed 1.0: ${value}`);
  }

  return result;
}

/**
 * Validate that a multiplier is a strictly positive finite number.
 * A multiplier of exactly 0 is treated as a data error.
 */
export function validateMultiplier(value: number, name: string): ValidationResult {
  const result = emptyResult();

  if (typeof value !== 'number' || !Number.isFinite(value)) {
    result.valid = false;
    result.errors.push(`${name} must be a finite number, got: ${value}`);
    return result;
  }

  if (value <= 0) {
    result.valid = false;
    result.errors.push(`${name} must be strictly positive, got: ${value}`);
  } else if (value > 10) {
    result.warnings.push(`${name} is unusually large (${value})`);
  }

  return result;
}

/**
 * Validate a parsed preset: baselines are probabilities, every multiplier is positive and
 * every domain a multiplier references has a baseline.
 */
export function validatePreset(preset: PresetFile): ValidationResult {
  const results: ValidationResult[] = [];
  const domains = Object.keys(preset.baseline);

  if (domains.length === 0) {
    results.push({ valid: false, errors: ['baseline must declare at least one domain'], warnings: [] });
  }

  for (const [domain, risk] of Object.entries(preset.baseline)) {
    results.push(validateProbability(risk, `baseline.${domain}`));
  }

  for (const [key, values] of Object.entries(preset.multipliers)) {
    for (const [domain, value] of Object.entries(values)) {
      if (!(domain in preset.baseline)) {
        results.push({
          valid: false,
          errors: [`multipliers.${key} references domain "${domain}" which has no baseline`],
          warnings: [],
        });
      }
      results.push(validateMultiplier(value, `multipliers.${key}.${domain}`));
    }
  }

  return aggregateValidationResults(results);
}

export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Aggregate validation results
 */
export function aggregateValidationResults(results: ValidationResult[]): ValidationResult {
  return {
    valid: results.every((r) => r.valid),
    errors: results.flatMap((r) => r.errors),
    warnings: results.flatMap((r) => r.warnings),
  };
}

/**
 * Throw the error built by `toError` if validation failed
 */
export function throwIfInvalid(
  result: ValidationResult,
  context: string,
  toError: (errors: string[]) => RiskEngineError
): void {
  if (!result.valid) {
    throw toError(result.errors);
  }

  // Log warnings even if valid
  for (const warning of result.warnings) {
    logger.warn({ context }, warning);
  }
}

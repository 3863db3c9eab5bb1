/**
 * Validation result types
 * @module @devstate/shared/validation/types
 */

/**
 * Single validation issue
 */
export interface ValidationIssue {
  field: string;
  message: string;
  code: string;
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
}

export function toResult(errors: ValidationIssue[]): ValidationResult {
  return { valid: errors.length === 0, errors };
}

/**
 * Narrow to a plain JSON object (not an array, not null)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

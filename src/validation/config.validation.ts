/**
 * Validation for run configuration coming from the environment and the
 * command line. Every value arrives as an optional string.
 *
 * Validators return a ValidationResult instead of throwing so that all
 * problems can be reported together.
 */

/**
 * Enumeration of configuration validation error codes.
 */
export enum ConfigErrorCode {
  /** Value is not a non-negative integer */
  INVALID_WORD_MINIMUM = 'INVALID_WORD_MINIMUM',
  /** Seed is neither a decimal nor a 0x-prefixed hexadecimal integer */
  INVALID_SEED = 'INVALID_SEED',
  /** Spread is not a positive finite number */
  INVALID_SPREAD = 'INVALID_SPREAD',
  /** Path is present but empty */
  INVALID_PATH = 'INVALID_PATH',
}

export interface ValidationError {
  code: ConfigErrorCode;
  message: string;
  /** Environment variable or argument that failed */
  field: string;
  received?: string;
}

export interface ValidationResult {
  isValid: boolean;
  errors: ValidationError[];
}

const UNSIGNED_INTEGER_REGEX = /^\d+$/;
const HEX_INTEGER_REGEX = /^0x[0-9a-f]+$/i;
const DECIMAL_NUMBER_REGEX = /^\d+(?:\.\d+)?$/;

function result(errors: ValidationError[]): ValidationResult {
  return { isValid: errors.length === 0, errors };
}

/**
 * A word minimum is a non-negative integer no larger than
 * Number.MAX_SAFE_INTEGER.
 */
export function validateWordMinimum(value: string, field: string): ValidationResult {
  const trimmed = value.trim();
  if (!UNSIGNED_INTEGER_REGEX.test(trimmed) || !Number.isSafeInteger(Number(trimmed))) {
    return result([
      {
        code: ConfigErrorCode.INVALID_WORD_MINIMUM,
        message: `${field} must be a non-negative integer`,
        field,
        received: value,
      },
    ]);
  }
  return result([]);
}

export function validateSeed(value: string, field: string): ValidationResult {
  const trimmed = value.trim();
  if (!UNSIGNED_INTEGER_REGEX.test(trimmed) && !HEX_INTEGER_REGEX.test(trimmed)) {
    return result([
      {
        code: ConfigErrorCode.INVALID_SEED,
        message: `${field} must be a decimal or 0x-prefixed hexadecimal integer`,
        field,
        received: value,
      },
    ]);
  }
  return result([]);
}

export function validateSpread(value: string, field: string): ValidationResult {
  const trimmed = value.trim();
  if (!DECIMAL_NUMBER_REGEX.test(trimmed) || !(Number(trimmed) > 0)) {
    return result([
      {
        code: ConfigErrorCode.INVALID_SPREAD,
        message: `${field} must be a positive number`,
        field,
        received: value,
      },
    ]);
  }
  return result([]);
}

export function validatePath(value: string, field: string): ValidationResult {
  if (value.trim().length === 0) {
    return result([
      {
        code: ConfigErrorCode.INVALID_PATH,
        message: `${field} cannot be empty`,
        field,
        received: value,
      },
    ]);
  }
  return result([]);
}

/**
 * Merges several validation results into one.
 */
export function combineResults(...results: ValidationResult[]): ValidationResult {
  return result(results.flatMap(r => r.errors));
}

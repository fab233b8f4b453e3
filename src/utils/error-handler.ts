/**
 * Error types and handling utilities for the book generator.
 *
 * The generator is a batch job, so every error here means "abort with a
 * diagnostic". Errors carry a machine-readable code which decides how they
 * are logged and which process exit code the CLI returns.
 */

import { logLine } from './logger';

/**
 * Enumeration of error codes raised by the generator.
 */
export enum ErrorCode {
  /** A word handed to the interner is not lowercase letters/apostrophes */
  INVALID_WORD = 'INVALID_WORD',
  /** The glossary data file is missing, unreadable or malformed */
  GLOSSARY_DATA_INVALID = 'GLOSSARY_DATA_INVALID',
  /** A glossary definition uses a word that is not a glossary key */
  GLOSSARY_NOT_CLOSED = 'GLOSSARY_NOT_CLOSED',
  /** Rendered content uses a word that is not a glossary key */
  UNDEFINED_WORD = 'UNDEFINED_WORD',
  /** The section id space ran out of free identifiers */
  ID_SPACE_EXHAUSTED = 'ID_SPACE_EXHAUSTED',
  /** The requested word minimum is not a non-negative integer */
  INVALID_WORD_MINIMUM = 'INVALID_WORD_MINIMUM',
  /** Environment or command-line configuration is invalid */
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  /** Anything not raised by the generator itself */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Error classification used for logging and exit codes.
 */
export enum ErrorClass {
  /** Static glossary data disagrees with the generated word universe */
  FATAL_DATA_ERROR = 'FATAL_DATA_ERROR',
  /** The run was configured with values it cannot work with */
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  /** A broken internal contract */
  PROGRAMMER_ERROR = 'PROGRAMMER_ERROR',
}

/** sysexits(3) codes */
const EXIT_CODES: Readonly<Record<ErrorClass, number>> = {
  [ErrorClass.FATAL_DATA_ERROR]: 65,
  [ErrorClass.CONFIGURATION_ERROR]: 78,
  [ErrorClass.PROGRAMMER_ERROR]: 70,
};

/**
 * Base class for every error the generator raises on purpose.
 */
export class BookError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class InvalidWordError extends BookError {
  constructor(readonly word: string) {
    super(
      ErrorCode.INVALID_WORD,
      `'${word}' is not a lowercase word`,
      { word }
    );
  }
}

export class GlossaryDataError extends BookError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.GLOSSARY_DATA_INVALID, message, details);
  }
}

export class GlossaryClosureError extends BookError {
  constructor(readonly word: string, readonly term: string) {
    super(
      ErrorCode.GLOSSARY_NOT_CLOSED,
      `'${word}' is not defined (used in the definition of '${term}')`,
      { word, term }
    );
  }
}

export class UndefinedWordError extends BookError {
  constructor(readonly word: string) {
    super(ErrorCode.UNDEFINED_WORD, `'${word}' is not defined`, { word });
  }
}

export class IdSpaceExhaustedError extends BookError {
  constructor(bits: number, attempts: number, allocated: number) {
    super(
      ErrorCode.ID_SPACE_EXHAUSTED,
      `No free ${bits}-bit section id found after ${attempts} attempts ` +
        `(${allocated} allocated)`,
      { bits, attempts, allocated }
    );
  }
}

export class InvalidWordMinimumError extends BookError {
  constructor(received: unknown) {
    super(
      ErrorCode.INVALID_WORD_MINIMUM,
      'word minimum must be a non-negative integer',
      { received }
    );
  }
}

export class ConfigurationError extends BookError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCode.INVALID_CONFIGURATION, message, details);
  }
}

/**
 * Classifies an error code.
 *
 * Data errors (glossary closure, undefined words, bad glossary file) mean the
 * static data and the generated text disagree. Configuration errors come from
 * the caller's settings. Everything else is a programmer error.
 */
export function classifyError(code: ErrorCode): ErrorClass {
  switch (code) {
    case ErrorCode.GLOSSARY_DATA_INVALID:
    case ErrorCode.GLOSSARY_NOT_CLOSED:
    case ErrorCode.UNDEFINED_WORD:
      return ErrorClass.FATAL_DATA_ERROR;
    case ErrorCode.ID_SPACE_EXHAUSTED:
    case ErrorCode.INVALID_WORD_MINIMUM:
    case ErrorCode.INVALID_CONFIGURATION:
      return ErrorClass.CONFIGURATION_ERROR;
    case ErrorCode.INVALID_WORD:
    case ErrorCode.INTERNAL_ERROR:
      return ErrorClass.PROGRAMMER_ERROR;
  }
}

function codeOf(error: unknown): ErrorCode {
  return error instanceof BookError ? error.code : ErrorCode.INTERNAL_ERROR;
}

/**
 * Logs an error as one structured line.
 *
 * Configuration errors are the caller's to fix, so they are logged without a
 * stack trace; data and programmer errors include it.
 *
 * @param error - Error object or message
 * @param operation - Operation that was running when the error surfaced
 */
export function logError(error: unknown, operation: string): void {
  const code = codeOf(error);
  const errorClass = classifyError(code);
  const stack = error instanceof Error ? error.stack : undefined;

  logLine({
    operation,
    errorCode: code,
    errorClass,
    message: error instanceof Error ? error.message : String(error),
    ...(error instanceof BookError && error.details ? { details: error.details } : {}),
    ...(errorClass !== ErrorClass.CONFIGURATION_ERROR && stack ? { stack } : {}),
  });
}

/**
 * Maps an error to the process exit code the CLI terminates with.
 */
export function exitCodeFor(error: unknown): number {
  return EXIT_CODES[classifyError(codeOf(error))];
}

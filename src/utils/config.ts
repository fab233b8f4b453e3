/**
 * Run configuration.
 *
 * Values come from the environment (loaded from .env by the entry point) and
 * from the command line; a positional word minimum overrides
 * BOOK_WORD_MINIMUM.
 */

import { DEFAULT_FIGURES_SPREAD } from '../services/section-renderers';
import {
  combineResults,
  validatePath,
  validateSeed,
  validateSpread,
  validateWordMinimum,
  type ValidationResult,
} from '../validation/config.validation';
import { ConfigurationError } from './error-handler';

export const DEFAULT_WORD_MINIMUM = 50_000;

export interface BookConfig {
  wordMinimum: number;
  /** Fixed PRNG seed; absent means a fresh seed per run */
  seed?: bigint;
  figuresSpread: number;
  /** Glossary file override; absent means the bundled glossary */
  glossaryDataPath?: string;
}

/**
 * Reads and validates configuration.
 *
 * @param env - Environment variables (usually process.env)
 * @param argv - Command-line arguments after the script name
 * @throws {ConfigurationError} Listing every invalid setting
 */
export function loadConfig(env: NodeJS.ProcessEnv, argv: readonly string[]): BookConfig {
  if (argv.length > 1) {
    throw new ConfigurationError('expected at most one argument: the word minimum', {
      received: [...argv],
    });
  }

  const wordMinimumField = argv.length === 1 ? 'wordMinimum' : 'BOOK_WORD_MINIMUM';
  const wordMinimum = argv.length === 1 ? argv[0] : env.BOOK_WORD_MINIMUM;
  const seed = env.BOOK_SEED;
  const spread = env.FIGURES_SPREAD;
  const glossaryDataPath = env.GLOSSARY_DATA_PATH;

  const checks: ValidationResult[] = [];
  if (wordMinimum !== undefined) {
    checks.push(validateWordMinimum(wordMinimum, wordMinimumField));
  }
  if (seed !== undefined) {
    checks.push(validateSeed(seed, 'BOOK_SEED'));
  }
  if (spread !== undefined) {
    checks.push(validateSpread(spread, 'FIGURES_SPREAD'));
  }
  if (glossaryDataPath !== undefined) {
    checks.push(validatePath(glossaryDataPath, 'GLOSSARY_DATA_PATH'));
  }

  const validation = combineResults(...checks);
  if (!validation.isValid) {
    throw new ConfigurationError(
      validation.errors.map(error => error.message).join('; '),
      { errors: validation.errors }
    );
  }

  return {
    wordMinimum: wordMinimum !== undefined ? Number(wordMinimum.trim()) : DEFAULT_WORD_MINIMUM,
    ...(seed !== undefined ? { seed: BigInt(seed.trim()) } : {}),
    figuresSpread: spread !== undefined ? Number(spread.trim()) : DEFAULT_FIGURES_SPREAD,
    ...(glossaryDataPath !== undefined ? { glossaryDataPath: glossaryDataPath.trim() } : {}),
  };
}

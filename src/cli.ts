import { BookAssemblyService } from './services/book-assembly.service';
import { loadGlossaryData } from './services/glossary.service';
import { PRNG } from './services/prng.service';
import { loadConfig } from './utils/config';
import { exitCodeFor, logError } from './utils/error-handler';

export const USAGE = 'Usage: book-generator [WORD_MINIMUM]';

/**
 * Generates a book and writes it to stdout.
 *
 * @param argv - Arguments after the script name
 * @param env - Environment variables
 * @returns Process exit code
 */
export function runCli(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): number {
  if (argv.includes('--help') || argv.includes('-h')) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  try {
    const config = loadConfig(env, argv);
    const service = new BookAssemblyService({
      prng: config.seed !== undefined ? new PRNG(config.seed) : PRNG.fromEntropy(),
      glossaryData: loadGlossaryData(config.glossaryDataPath),
      figuresSpread: config.figuresSpread,
    });
    const book = service.generate(config.wordMinimum);
    process.stdout.write(`${book.render()}\n`);
    return 0;
  } catch (error) {
    logError(error, 'runCli');
    return exitCodeFor(error);
  }
}

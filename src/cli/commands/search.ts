/**
 * The search command: compile one pattern and report every match in the corpus.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig } from '../../core/config/loader.js';
import { compilePattern } from '../../core/pattern/compiler.js';
import { search } from '../../core/match/search.js';
import { loadTyped, loadUntyped } from '../../core/corpus/loader.js';
import type { CorpusOptions } from '../../core/corpus/types.js';
import type { Match } from '../../core/match/types.js';
import { createFormatter } from '../formatters/index.js';
import { ErrorCodes, TsgrepError, UsageError } from '../../utils/errors.js';
import { pluralize } from '../../utils/format.js';
import { logger } from '../../utils/logger.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface SearchCommandOptions {
  expr?: string[];
  recursive?: boolean;
  aggressive?: boolean;
  typed?: boolean;
  json?: boolean;
  config?: string;
  verbose?: boolean;
  /** false under --no-color */
  color?: boolean;
}

export const PATTERN_HELP = `
Patterns are TypeScript or JavaScript fragments: an expression, a list of
expressions, one or more statements, a type, or declarations. Wildcards:

  $name            any single node; every $name in a pattern must match the same code
  $_               any single node, without binding
  $*name, $*_      any number of sibling nodes (arguments, statements, ...)
  $(name, /re/)    an identifier whose whole name matches the regex
  $*(name, /re/)   any number of such identifiers
  $~               at the very start: aggressive mode (same as -a)

Aggressive mode ignores parentheses, treats a block holding one statement as
that statement, and lets let, const and var match each other.

Examples:
  tsgrep -x '$x.$_ = $x' src
  tsgrep 'console.$(_, /log|debug/)($*_)' 'src/**/*.ts'
  tsgrep -x 'if ($c) { $*_; }' --json lib
`;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Create the search command.
 *
 * @param onExit - Receives the exit code once the search has finished
 */
export function createSearchCommand(
  onExit: (code: number) => void = (code) => {
    process.exitCode = code;
  }
): Command {
  return new Command('tsgrep')
    .description('Search TypeScript and JavaScript code by syntax tree')
    .argument('[paths...]', 'Files, directories or glob patterns to search (default: .)')
    .option('-x, --expr <pattern>', 'Pattern to search for (repeatable)', collect, [])
    .option('-r, --recursive', 'Also search files reached through imports')
    .option('-a, --aggressive', 'Match more loosely (see below)')
    .option('--typed', 'Type-check the corpus before searching')
    .option('--json', 'Output matches as JSON')
    .option('--config <path>', 'Path to config file (default: .tsgrep.yaml)')
    .option('--verbose', 'Log progress to stderr')
    .option('--no-color', 'Disable colored output')
    .addHelpText('after', PATTERN_HELP)
    .action(async (paths: string[], options: SearchCommandOptions) => {
      onExit(await runSearch(paths, options));
    });
}

/**
 * Run one search and write its output. Never throws; returns the exit code.
 *
 * Without -x, the first positional argument is the pattern.
 */
export async function runSearch(
  positionals: string[],
  options: SearchCommandOptions,
  cwd: string = process.cwd()
): Promise<number> {
  if (options.color === false) {
    chalk.level = 0;
  }

  const exprs = options.expr ?? [];
  if (exprs.length === 0 && positionals.length === 0) {
    printError(new UsageError(ErrorCodes.MISSING_COMMAND, 'no pattern given; use -x <pattern> or pass it as the first argument'));
    return EXIT_USAGE;
  }
  if (exprs.length > 1) {
    printError(new UsageError(ErrorCodes.COMMAND_COMPOSITION, 'command composability is not yet supported'));
    return EXIT_FAILURE;
  }

  const pattern = exprs.length === 1 ? exprs[0] : positionals[0];
  const paths = exprs.length === 1 ? positionals : positionals.slice(1);

  try {
    const config = await loadConfig(cwd, options.config);
    logger.setLevel(options.verbose ? 'debug' : config.log_level);

    const compiled = compilePattern(pattern, {
      aggressive: Boolean(options.aggressive) || config.search.aggressive,
    });
    logger.debug(`Compiled pattern as ${compiled.category}`);

    const corpusOptions: CorpusOptions = {
      cwd,
      include: config.files.include,
      exclude: config.files.exclude,
    };
    const recursive = Boolean(options.recursive) || config.search.recursive;
    const sourceFiles = Boolean(options.typed) || config.search.typed
      ? (await loadTyped(paths, recursive, corpusOptions)).packages.flatMap((pkg) => pkg.files)
      : await loadUntyped(paths, recursive, corpusOptions);

    const matches: Match[] = sourceFiles.flatMap((sourceFile) => search(compiled, sourceFile));
    logger.info(`${pluralize(matches.length, 'match', 'matches')} in ${pluralize(sourceFiles.length, 'file')}`);

    const formatter = createFormatter({
      format: options.json ? 'json' : config.output.format,
      colors: options.color !== false,
      relativePaths: config.output.relative_paths,
      cwd,
    });
    const output = formatter.formatMatches(matches);
    if (output) {
      console.log(output);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof TsgrepError) {
      printError(error);
    } else {
      logger.error('Search failed', error instanceof Error ? error : undefined);
    }
    return EXIT_FAILURE;
  }
}

function printError(error: TsgrepError): void {
  console.error(chalk.red(`error: ${error.message}`));
}

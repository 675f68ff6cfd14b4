/**
 * CLI entry: the tsgrep program and its exit-code handling.
 */
import { Command, CommanderError } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createSearchCommand, EXIT_SUCCESS, EXIT_USAGE } from './commands/search.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const VERSION: string = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8')).version;

/**
 * Create the CLI program.
 *
 * @param onExit - Receives the exit code of a completed search
 */
export function createCli(onExit?: (code: number) => void): Command {
  return createSearchCommand(onExit).version(VERSION).exitOverride();
}

/**
 * Parse `argv` and run the program, returning the process exit code.
 * Commander usage errors exit with 2; --help and --version with 0.
 */
export async function runCli(argv: string[]): Promise<number> {
  let exitCode = EXIT_SUCCESS;
  const program = createCli((code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_USAGE;
    }
    throw error;
  }
  return exitCode;
}

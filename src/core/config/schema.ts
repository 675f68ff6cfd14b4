import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Default source extensions searched when a directory is given. */
export const DEFAULT_INCLUDE = [
  '**/*.ts',
  '**/*.tsx',
  '**/*.mts',
  '**/*.cts',
  '**/*.js',
  '**/*.jsx',
  '**/*.mjs',
  '**/*.cjs',
];

/** File scanning patterns used to expand directory arguments. */
export const FileScanPatternsSchema = z.object({
  /** Glob patterns for files to include */
  include: z.array(z.string()).default(DEFAULT_INCLUDE),
  /** Glob patterns for files to exclude */
  exclude: z.array(z.string()).default([
    '**/node_modules/**',
    '**/dist/**',
    '**/build/**',
    '**/coverage/**',
  ]),
});

/** Defaults for the search itself; command-line flags take precedence. */
export const SearchSettingsSchema = z.object({
  /** Enable aggressive matching without the `$~` pattern marker */
  aggressive: z.boolean().default(false),
  /** Type-check the corpus before searching */
  typed: z.boolean().default(false),
  /** Also search files reached through imports */
  recursive: z.boolean().default(false),
});

/** Output format for match results. */
export const OutputFormatSchema = z.enum(['human', 'json']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
  /** Print paths under the working directory relative to it */
  relative_paths: z.boolean().default(true),
});

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Complete .tsgrep.yaml schema. */
export const ConfigSchema = z.object({
  files: withDefaults(FileScanPatternsSchema),
  search: withDefaults(SearchSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
  log_level: LogLevelSchema.default('warn'),
});

// Type exports (inferred from schemas)
export type FileScanPatterns = z.infer<typeof FileScanPatternsSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type OutputSettings = z.infer<typeof OutputSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;

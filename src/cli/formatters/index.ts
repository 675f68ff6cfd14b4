/**
 * Formatter exports.
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { IFormatter, FormatOptions } from './types.js';

export { HumanFormatter, JsonFormatter };
export type { JsonMatch } from './json.js';
export type { IFormatter, FormatOptions, OutputFormat } from './types.js';

/**
 * Create the formatter for an output format.
 */
export function createFormatter(options: FormatOptions): IFormatter {
  return options.format === 'json' ? new JsonFormatter(options) : new HumanFormatter(options);
}

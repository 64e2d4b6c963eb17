/**
 * @arch testsmith.cli.barrel
 */
import { HumanFormatter } from './human.js';
import { JsonFormatter } from './json.js';
import type { FormatOptions, IFormatter } from './types.js';

export * from './types.js';
export { HumanFormatter } from './human.js';
export { JsonFormatter } from './json.js';

/**
 * Create a formatter for the requested output mode.
 */
export function createFormatter(json: boolean, options: Partial<FormatOptions> = {}): IFormatter {
  return json ? new JsonFormatter() : new HumanFormatter(options);
}

/**
 * Barrel export for the conversion runner and its inputs.
 */

export { convertFiles } from './run.js';
export type { ConvertFilesOptions, ConversionSummary } from './run.js';
export { loadServiceDictionary, parseLabels, resolveInputFiles } from './loaders.js';
export type { ResolvedInputs } from './loaders.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliOptions } from './args.js';
export { runCli } from './command.js';
export { CliUsageError } from './errors.js';

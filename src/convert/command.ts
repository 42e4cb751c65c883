/**
 * Converter Command
 *
 * Wires CLI options to the loaders and the batch runner, and maps outcomes
 * to exit codes:
 * - 0: every input converted (record-level skips and conflicts are not failures)
 * - 1: usage/configuration error, or no input file could be converted
 */

import type { ConvertConfig } from '../config.js';
import { describeError } from '../checklist/engine/index.js';
import { ServiceDictionaryError } from '../checklist/errors.js';
import { UnsupportedFormatError } from '../store/index.js';
import { parseCliArgs, USAGE } from './args.js';
import { CliUsageError } from './errors.js';
import { loadServiceDictionary, parseLabels } from './loaders.js';
import { convertFiles } from './run.js';

function isConfigurationError(err: unknown): boolean {
  return (
    err instanceof CliUsageError ||
    err instanceof UnsupportedFormatError ||
    err instanceof ServiceDictionaryError
  );
}

export function runCli(argv: string[], config: ConvertConfig): number {
  try {
    const options = parseCliArgs(argv, config);
    if (options.help) {
      console.log(USAGE);
      return 0;
    }

    const serviceDictionary = options.serviceDictionaryPath
      ? loadServiceDictionary(options.serviceDictionaryPath)
      : undefined;
    const labels = options.labels ? parseLabels(options.labels) : undefined;

    const summary = convertFiles({
      inputs: options.inputs,
      outputDir: options.outputDir,
      format: options.format,
      overwrite: options.overwrite,
      verbose: options.verbose,
      serviceDictionary,
      labels,
      labelNames: options.labelNames,
    });

    console.log('[convert] Done', {
      converted: summary.converted.length,
      failed: summary.failed.length,
      missing: summary.missing.length,
      recordsWritten: summary.recordsWritten,
      conflicts: summary.conflicts,
      skipped: summary.skipped,
    });

    return summary.converted.length === 0 ? 1 : 0;
  } catch (err) {
    if (!isConfigurationError(err)) throw err;
    console.error('ERROR:', describeError(err));
    if (err instanceof CliUsageError) console.error(USAGE);
    return 1;
  }
}

/**
 * Command-Line Argument Parsing
 *
 * Flags use the `--name=value` form; bare arguments are input paths.
 * Values not given on the command line come from the environment
 * configuration (src/config.ts).
 */

import type { ConvertConfig } from '../config.js';
import { CliUsageError } from './errors.js';

export interface CliOptions {
  inputs: string[];
  outputDir: string;
  format: string;
  overwrite: boolean;
  verbose: boolean;
  serviceDictionaryPath: string | undefined;
  labels: string | undefined;
  labelNames: {
    id: string;
    category: string;
    subcategory: string;
  };
  help: boolean;
}

export const USAGE = `Usage: checklist-v2 [options] <input...>

Converts v1 checklist JSON files (or directories of them) to v2 recommendation files.

Options:
  --input=<path>              v1 JSON file or directory (repeatable; bare arguments work too)
  --output=<dir>              Root directory for v2 files
  --format=<yaml|yml|json>    Output format
  --overwrite                 Replace existing files with the same GUID
  --verbose                   Print DEBUG output
  --services=<path>           Service dictionary (.json, .yaml, .yml)
  --labels=<labels>           Extra labels, JSON object or key=value,key=value
  --id-label=<name>           Label key for item ids
  --category-label=<name>     Label key for categories
  --subcategory-label=<name>  Label key for subcategories
  --help                      Show this message`;

const BOOLEAN_FLAGS = new Set(['overwrite', 'verbose', 'help']);
const VALUE_FLAGS = new Set([
  'input',
  'output',
  'format',
  'services',
  'labels',
  'id-label',
  'category-label',
  'subcategory-label',
]);

/**
 * Parses CLI arguments (without the node/script prefix) on top of the defaults.
 *
 * @throws CliUsageError on unknown flags or flags missing their value
 */
export function parseCliArgs(argv: string[], defaults: ConvertConfig): CliOptions {
  const options: CliOptions = {
    inputs: [],
    outputDir: defaults.outputDir,
    format: defaults.outputFormat,
    overwrite: defaults.overwrite,
    verbose: defaults.verbose,
    serviceDictionaryPath: defaults.serviceDictionaryPath,
    labels: defaults.extraLabels,
    labelNames: { ...defaults.labelNames },
    help: false,
  };

  for (const arg of argv) {
    if (!arg.startsWith('--')) {
      options.inputs.push(arg);
      continue;
    }

    const separator = arg.indexOf('=');
    const name = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    const value = separator === -1 ? undefined : arg.slice(separator + 1);

    if (BOOLEAN_FLAGS.has(name)) {
      if (value !== undefined) {
        throw new CliUsageError(`--${name} does not take a value`);
      }
      if (name === 'overwrite') options.overwrite = true;
      else if (name === 'verbose') options.verbose = true;
      else options.help = true;
      continue;
    }

    if (!VALUE_FLAGS.has(name)) {
      throw new CliUsageError(`Unknown option: --${name}`);
    }
    if (value === undefined || value === '') {
      throw new CliUsageError(`--${name} requires a value (--${name}=...)`);
    }

    switch (name) {
      case 'input':
        options.inputs.push(value);
        break;
      case 'output':
        options.outputDir = value;
        break;
      case 'format':
        options.format = value;
        break;
      case 'services':
        options.serviceDictionaryPath = value;
        break;
      case 'labels':
        options.labels = value;
        break;
      case 'id-label':
        options.labelNames.id = value;
        break;
      case 'category-label':
        options.labelNames.category = value;
        break;
      case 'subcategory-label':
        options.labelNames.subcategory = value;
        break;
    }
  }

  if (!options.help && options.inputs.length === 0) {
    throw new CliUsageError('No input files given');
  }

  return options;
}

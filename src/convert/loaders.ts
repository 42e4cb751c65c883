/**
 * Input Loaders
 *
 * Reads the collaborator-supplied inputs for a conversion run: the service
 * dictionary, extra labels, and the list of v1 files to convert.
 */

import { existsSync, readFileSync, statSync } from 'node:fs';
import { extname, join } from 'node:path';
import fg from 'fast-glob';
import { parse as parseYaml } from 'yaml';
import {
  ExtraLabelsSchema,
  ServiceDictionarySchema,
} from '../checklist/types/index.js';
import type { ExtraLabels, ServiceDictionary } from '../checklist/types/index.js';
import { ServiceDictionaryError } from '../checklist/errors.js';
import { describeError } from '../checklist/engine/index.js';
import { CliUsageError } from './errors.js';

// ---------------------------------------------------------------------------
// Service Dictionary
// ---------------------------------------------------------------------------

/**
 * Loads a service dictionary from a .json, .yaml or .yml file.
 *
 * @throws ServiceDictionaryError if the file is missing, unparseable or not a list of
 *   `{ names, service, arm }` entries
 */
export function loadServiceDictionary(filePath: string): ServiceDictionary {
  let raw: unknown;
  try {
    const text = readFileSync(filePath, 'utf-8');
    const ext = extname(filePath).toLowerCase();
    raw = ext === '.yaml' || ext === '.yml' ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    throw new ServiceDictionaryError(
      `Could not read service dictionary ${filePath}: ${describeError(err)}`,
      filePath,
    );
  }

  const parsed = ServiceDictionarySchema.safeParse(raw);
  if (!parsed.success) {
    throw new ServiceDictionaryError(
      `Invalid service dictionary ${filePath}: ${describeError(parsed.error)}`,
      filePath,
    );
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Extra Labels
// ---------------------------------------------------------------------------

/**
 * Parses extra labels from either a JSON object ('{"team":"core"}') or
 * comma-separated pairs ('team=core,reviewed=yes').
 *
 * @throws CliUsageError on malformed input
 */
export function parseLabels(text: string): ExtraLabels {
  const trimmed = text.trim();
  if (trimmed === '') return {};

  if (trimmed.startsWith('{')) {
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (err) {
      throw new CliUsageError(`Invalid labels JSON: ${describeError(err)}`);
    }
    const parsed = ExtraLabelsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CliUsageError(`Labels must map strings to strings: ${describeError(parsed.error)}`);
    }
    return parsed.data;
  }

  const labels: ExtraLabels = {};
  for (const pair of trimmed.split(',')) {
    const separator = pair.indexOf('=');
    const key = separator > 0 ? pair.slice(0, separator).trim() : '';
    if (key === '') {
      throw new CliUsageError(`Invalid label "${pair}", expected key=value`);
    }
    labels[key] = pair.slice(separator + 1).trim();
  }
  return labels;
}

// ---------------------------------------------------------------------------
// Input Files
// ---------------------------------------------------------------------------

export interface ResolvedInputs {
  /** v1 files to convert, in argument order; directory contents sorted by name */
  files: string[];
  /** Arguments that do not exist on disk */
  missing: string[];
}

/**
 * Expands input arguments into v1 file paths.
 * A directory contributes the *.json files directly inside it. Paths are kept
 * as given, since they end up in the `source.file` of locally sourced records.
 */
export function resolveInputFiles(paths: string[]): ResolvedInputs {
  const result: ResolvedInputs = { files: [], missing: [] };

  for (const inputPath of paths) {
    if (!existsSync(inputPath)) {
      result.missing.push(inputPath);
      continue;
    }
    if (statSync(inputPath).isDirectory()) {
      const found = fg.sync('*.json', { cwd: inputPath, onlyFiles: true }).sort();
      result.files.push(...found.map((name) => join(inputPath, name)));
    } else {
      result.files.push(inputPath);
    }
  }

  return result;
}

/**
 * Batch Conversion Runner
 *
 * Converts each v1 input file in turn and stores its records:
 * 1. Resolve input arguments to files (directories expand to *.json)
 * 2. generateV2 per file; a failed file is counted and skipped
 * 3. storeV2 the file's records into the shared output tree
 *
 * Files are processed one at a time against the same output root, so a GUID
 * already stored from an earlier file is detected as a conflict (or replaced,
 * with overwrite) exactly as on a rerun.
 */

import { generateV2 } from '../checklist/engine/index.js';
import type { ExtraLabels, ServiceDictionary } from '../checklist/types/index.js';
import { storeV2, isOutputFormat, UnsupportedFormatError } from '../store/index.js';
import { resolveInputFiles } from './loaders.js';

export interface ConvertFilesOptions {
  inputs: string[];
  outputDir: string;
  format: string;
  overwrite: boolean;
  verbose: boolean;
  serviceDictionary?: ServiceDictionary;
  labels?: ExtraLabels;
  labelNames?: {
    id?: string;
    category?: string;
    subcategory?: string;
  };
}

export interface ConversionSummary {
  /** Input files converted and stored */
  converted: string[];
  /** Input files generateV2 rejected */
  failed: string[];
  /** Input arguments not found on disk */
  missing: string[];
  recordsWritten: number;
  conflicts: number;
  skipped: number;
}

/**
 * Converts and stores every input file.
 *
 * @throws UnsupportedFormatError before any file is read if the format is not yaml/yml/json
 */
export function convertFiles(options: ConvertFilesOptions): ConversionSummary {
  if (!isOutputFormat(options.format)) {
    throw new UnsupportedFormatError(options.format);
  }

  const { files, missing } = resolveInputFiles(options.inputs);
  for (const path of missing) {
    console.error('[convert] Input not found, skipping', { path });
  }

  const summary: ConversionSummary = {
    converted: [],
    failed: [],
    missing,
    recordsWritten: 0,
    conflicts: 0,
    skipped: 0,
  };

  for (const inputFile of files) {
    const records = generateV2(inputFile, {
      serviceDictionary: options.serviceDictionary,
      labels: options.labels,
      idLabel: options.labelNames?.id,
      categoryLabel: options.labelNames?.category,
      subcategoryLabel: options.labelNames?.subcategory,
      verbose: options.verbose,
    });

    if (records === null) {
      summary.failed.push(inputFile);
      continue;
    }

    const result = storeV2(options.outputDir, records, {
      format: options.format,
      overwrite: options.overwrite,
      verbose: options.verbose,
    });

    summary.converted.push(inputFile);
    summary.recordsWritten += result.written.length;
    summary.conflicts += result.conflicts.length;
    summary.skipped += result.skipped;

    console.log('[convert] File converted', {
      inputFile,
      records: records.length,
      written: result.written.length,
      conflicts: result.conflicts.length,
      skipped: result.skipped,
    });
  }

  return summary;
}

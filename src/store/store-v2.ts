/**
 * v2 Record Store
 *
 * Writes each v2 record to its own file:
 *   <outputRoot>/<Service>/<WafPillar>/<guid>.<yaml|json>
 *
 * Spaces are stripped from the service and pillar directory names. Records
 * without a service go under "cross-service"; records without a pillar sit
 * directly in the service directory.
 *
 * Before writing, the whole output tree is searched for a file with the same
 * name, since a record may have changed service or pillar since the last run:
 * - overwrite off: the record is skipped and the existing path reported
 * - overwrite on: the existing file is deleted and the record written at its
 *   new location; empty directories are pruned once all records are stored
 *
 * Records without a GUID, and records whose file cannot be written, are
 * reported and skipped.
 */

import { existsSync, mkdirSync, unlinkSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import fg from 'fast-glob';
import type { V2Record } from '../checklist/types/index.js';
import { describeError } from '../checklist/engine/index.js';
import { removeEmptyDirectories } from './cleanup.js';
import { UnsupportedFormatError } from './errors.js';
import { extensionFor, serializeRecord } from './serializer.js';
import { CROSS_SERVICE_DIR, isOutputFormat } from './types.js';
import type { StoreResult, StoreV2Options } from './types.js';

// ---------------------------------------------------------------------------
// Path Helpers
// ---------------------------------------------------------------------------

function stripSpaces(value: string): string {
  return value.replaceAll(' ', '');
}

/** Directory a record belongs in under `outputRoot` */
export function resolveRecordDirectory(outputRoot: string, record: V2Record): string {
  const serviceDir = record.service !== undefined ? stripSpaces(record.service) : CROSS_SERVICE_DIR;
  return record.waf !== undefined
    ? join(outputRoot, serviceDir, stripSpaces(record.waf))
    : join(outputRoot, serviceDir);
}

/**
 * Searches the whole output tree for a file with the given name.
 *
 * @returns Absolute path of the first match, or null
 */
export function findExistingRecordFile(outputRoot: string, fileName: string): string | null {
  const matches = fg.sync(`**/${fg.escapePath(fileName)}`, {
    cwd: outputRoot,
    absolute: true,
    onlyFiles: true,
    dot: true,
  });
  return matches.length > 0 ? resolve(matches[0]) : null;
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

/**
 * Persists v2 records as individual files under `outputRoot`.
 *
 * @throws UnsupportedFormatError before anything is written if the format is not yaml/yml/json
 */
export function storeV2(
  outputRoot: string,
  records: V2Record[],
  options: StoreV2Options = {},
): StoreResult {
  const format = options.format ?? 'yaml';
  if (!isOutputFormat(format)) {
    throw new UnsupportedFormatError(format);
  }
  const overwrite = options.overwrite ?? false;
  const extension = extensionFor(format);

  if (options.verbose) console.log('DEBUG: Storing v2 objects in folder', outputRoot);
  if (!existsSync(outputRoot)) mkdirSync(outputRoot, { recursive: true });

  const result: StoreResult = { written: [], conflicts: [], skipped: 0 };

  for (const record of records) {
    if (record.guid === undefined) {
      console.error('ERROR: No GUID found in recommendation, skipping', record.title ?? '(untitled)');
      result.skipped++;
      continue;
    }

    const targetDir = resolveRecordDirectory(outputRoot, record);
    const fileName = `${record.guid}.${extension}`;
    const outputFile = join(targetDir, fileName);

    try {
      mkdirSync(targetDir, { recursive: true });
      const existing = findExistingRecordFile(outputRoot, fileName);

      if (existing !== null) {
        if (!overwrite) {
          console.error(`ERROR: File ${existing} already exists for recommendation, skipping`);
          result.conflicts.push(existing);
          continue;
        }
        unlinkSync(existing);
      }

      writeFileSync(outputFile, serializeRecord(record, format));
    } catch (err) {
      console.error('ERROR: Error when storing recommendation in', outputFile, ':', describeError(err));
      result.skipped++;
      continue;
    }

    result.written.push(outputFile);
    if (options.verbose) {
      console.log(`DEBUG: Stored ${extension.toUpperCase()} recommendation in`, outputFile);
    }
  }

  if (overwrite) {
    try {
      if (options.verbose) console.log('DEBUG: Removing empty directories in output folder', outputRoot);
      removeEmptyDirectories(outputRoot);
    } catch (err) {
      console.error(
        'ERROR: Error when removing empty directories in output folder',
        outputRoot,
        ':',
        describeError(err),
      );
    }
  }

  return result;
}

/**
 * v1 → v2 Conversion Engine
 *
 * Reads a legacy checklist JSON file and maps every item to a v2 record.
 *
 * Design principles:
 * - Field presence is checked per field: a missing v1 key omits the matching
 *   v2 key and never invalidates the item
 * - All-or-nothing per input file: a missing `items` array, unreadable file,
 *   malformed JSON, or a single malformed item yields `null`, never a partial list
 * - Service normalization and resource-type inference search the dictionary
 *   independently, first match wins
 * - Extra labels are merged last and override mapped labels with the same key
 */

import { readFileSync } from 'node:fs';
import { ZodError } from 'zod';
import { V1ChecklistSchema } from '../types/index.js';
import type {
  V1Item,
  V2Record,
  V2Severity,
  V2Source,
  V2Queries,
  ServiceDictionary,
  ExtraLabels,
} from '../types/index.js';
import { ChecklistInputError } from '../errors.js';
import { lookupService, lookupResourceType } from './service-lookup.js';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface GenerateV2Options {
  serviceDictionary?: ServiceDictionary;
  /** Static labels added to every record */
  labels?: ExtraLabels;
  /** Label key for the v1 `id` field (default: "id") */
  idLabel?: string;
  /** Label key for the v1 `category` field (default: "area") */
  categoryLabel?: string;
  /** Label key for the v1 `subcategory` field (default: "subarea") */
  subcategoryLabel?: string;
  verbose?: boolean;
}

interface LabelNames {
  id: string;
  category: string;
  subcategory: string;
}

export const DEFAULT_LABEL_NAMES: Readonly<LabelNames> = {
  id: 'id',
  category: 'area',
  subcategory: 'subarea',
};

function resolveLabelNames(options: GenerateV2Options): LabelNames {
  return {
    id: options.idLabel || DEFAULT_LABEL_NAMES.id,
    category: options.categoryLabel || DEFAULT_LABEL_NAMES.category,
    subcategory: options.subcategoryLabel || DEFAULT_LABEL_NAMES.subcategory,
  };
}

// ---------------------------------------------------------------------------
// Field Helpers
// ---------------------------------------------------------------------------

const SEVERITY_CODES: Readonly<Record<string, V2Severity>> = {
  high: 0,
  medium: 1,
  low: 2,
};

/**
 * Encodes a v1 severity string. Unrecognized values map to undefined
 * so the record carries no `severity` key.
 */
export function mapSeverity(severity: string | undefined): V2Severity | undefined {
  if (severity === undefined) return undefined;
  const key = severity.toLowerCase();
  return Object.hasOwn(SEVERITY_CODES, key) ? SEVERITY_CODES[key] : undefined;
}

/**
 * Works out where a recommendation came from.
 *
 * Priority:
 * 1. `source` — "aprl"/"wafsg" literally, else inferred from a .yaml (APRL)
 *    or .md (WAF service guide) file name; any other value yields no source
 * 2. `sourceType` (+ optional `sourceFile`)
 * 3. the v1 file being converted, as a local source
 */
export function resolveSource(item: V1Item, inputFile: string): V2Source | undefined {
  if (item.source !== undefined) {
    const normalized = item.source.toLowerCase();
    if (normalized === 'aprl' || normalized === 'wafsg') return { type: normalized };
    if (item.source.includes('.yaml')) return { type: 'aprl' };
    if (item.source.includes('.md')) return { type: 'wafsg' };
    return undefined;
  }

  if (item.sourceType !== undefined) {
    const source: V2Source = { type: item.sourceType.toLowerCase() };
    if (item.sourceFile !== undefined) source.file = item.sourceFile;
    return source;
  }

  return { type: 'local', file: inputFile };
}

function buildLinks(item: V1Item): string[] {
  const links: string[] = [];
  if (item.link !== undefined) links.push(item.link);
  if (item.training !== undefined) links.push(item.training);
  return links;
}

function buildResourceTypes(item: V1Item, dictionary?: ServiceDictionary): string[] {
  if (item.recommendationResourceType !== undefined) {
    return [item.recommendationResourceType];
  }
  if (item.service === undefined) return [];
  const arm = lookupResourceType(item.service, dictionary);
  return arm !== undefined ? [arm] : [];
}

// ---------------------------------------------------------------------------
// Item Mapping
// ---------------------------------------------------------------------------

/**
 * Maps one validated v1 item to a v2 record.
 * Optional keys are left out entirely when their v1 counterpart is missing.
 */
export function convertItem(
  item: V1Item,
  inputFile: string,
  options: GenerateV2Options = {},
): V2Record {
  const labelNames = resolveLabelNames(options);

  const labels: Record<string, string> = {};
  if (item.category !== undefined) labels[labelNames.category] = item.category;
  if (item.subcategory !== undefined) labels[labelNames.subcategory] = item.subcategory;
  if (item.id !== undefined) labels[labelNames.id] = item.id;
  if (options.labels) Object.assign(labels, options.labels);

  const queries: V2Queries = item.graph !== undefined ? { arg: item.graph } : [];
  const severity = mapSeverity(item.severity);
  const source = resolveSource(item, inputFile);

  return {
    ...(item.guid !== undefined ? { guid: item.guid } : {}),
    ...(item.text !== undefined ? { title: item.text } : {}),
    ...(item.description !== undefined ? { description: item.description } : {}),
    ...(item.waf !== undefined ? { waf: item.waf } : {}),
    ...(severity !== undefined ? { severity } : {}),
    labels,
    queries,
    links: buildLinks(item),
    ...(source !== undefined ? { source } : {}),
    ...(item.service !== undefined
      ? { service: lookupService(item.service, options.serviceDictionary) }
      : {}),
    resourceTypes: buildResourceTypes(item, options.serviceDictionary),
  };
}

// ---------------------------------------------------------------------------
// Document Conversion
// ---------------------------------------------------------------------------

function hasItemsKey(document: unknown): boolean {
  return typeof document === 'object' && document !== null && 'items' in document;
}

/**
 * Converts an already-parsed v1 document.
 *
 * @throws ChecklistInputError when the document has no `items` key
 * @throws ZodError when `items` is not an array or an item holds a non-string value
 */
export function convertChecklist(
  document: unknown,
  inputFile: string,
  options: GenerateV2Options = {},
): V2Record[] {
  if (!hasItemsKey(document)) {
    throw new ChecklistInputError(`No items found in JSON file ${inputFile}`, inputFile);
  }
  const checklist = V1ChecklistSchema.parse(document);
  return checklist.items.map((item) => convertItem(item, inputFile, options));
}

/** Short single-line description of a conversion failure for the error log */
export function describeError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Reads a v1 checklist JSON file and converts all of its items.
 *
 * Errors are reported on the console and turn into a `null` result so the
 * caller can move on to the next input file.
 *
 * @returns v2 records in input order, or null if the file could not be converted
 */
export function generateV2(
  inputFile: string,
  options: GenerateV2Options = {},
): V2Record[] | null {
  if (options.verbose) console.log('DEBUG: Converting file', inputFile);

  try {
    const document: unknown = JSON.parse(readFileSync(inputFile, 'utf-8'));
    if (!hasItemsKey(document)) {
      console.error('ERROR: No items found in JSON file', inputFile);
      return null;
    }
    const records = convertChecklist(document, inputFile, options);
    if (options.verbose) {
      console.log(`DEBUG: ${records.length} items found in JSON file ${inputFile}`);
    }
    return records;
  } catch (err) {
    console.error(
      'ERROR: Error when processing JSON file, nothing changed',
      inputFile,
      ':',
      describeError(err),
    );
    return null;
  }
}

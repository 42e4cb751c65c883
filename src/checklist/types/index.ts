/**
 * Barrel export for all checklist type definitions.
 *
 * Consumers should import from this module:
 *   import type { V1Item, V2Record, ServiceDictionary } from './types/index.js';
 */

// Legacy v1 schema
export { V1ItemSchema, V1ChecklistSchema } from './v1.js';
export type { V1Item, V1Checklist } from './v1.js';

// Normalized v2 schema
export type {
  V2Record,
  V2Severity,
  V2Source,
  V2SourceType,
  V2Queries,
} from './v2.js';

// Service dictionary and labels
export {
  ServiceDictionaryEntrySchema,
  ServiceDictionarySchema,
  ExtraLabelsSchema,
} from './service-dictionary.js';
export type {
  ServiceDictionaryEntry,
  ServiceDictionary,
  ExtraLabels,
} from './service-dictionary.js';

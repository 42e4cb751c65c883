/**
 * Checklist v1 → v2 Converter
 *
 * Library entry point. The command-line entry is src/convert/cli.ts.
 *
 * Typical use:
 *   const records = generateV2('aks_checklist.en.json', { serviceDictionary });
 *   if (records) storeV2('./v2', records, { format: 'yaml', overwrite: true });
 */

export * from './checklist/engine/index.js';
export * from './checklist/types/index.js';
export { ChecklistInputError, ServiceDictionaryError } from './checklist/errors.js';
export * from './store/index.js';
export * from './convert/index.js';
export { loadConvertConfig } from './config.js';
export type { ConvertConfig } from './config.js';

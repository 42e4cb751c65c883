/**
 * Barrel export for the v2 record store.
 */

export { storeV2, resolveRecordDirectory, findExistingRecordFile } from './store-v2.js';
export { serializeRecord, toYaml, toJson, extensionFor, trimMultilineString } from './serializer.js';
export { removeEmptyDirectories } from './cleanup.js';
export { UnsupportedFormatError } from './errors.js';
export { OUTPUT_FORMATS, CROSS_SERVICE_DIR, isOutputFormat } from './types.js';
export type { OutputFormat, StoreV2Options, StoreResult } from './types.js';

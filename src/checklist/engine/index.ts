/**
 * Barrel export for the v1 → v2 conversion engine.
 *
 * Primary export: generateV2 — file in, v2 records out.
 * Also exports the pure mapping helpers for testing and advanced use.
 */

export {
  generateV2,
  convertChecklist,
  convertItem,
  mapSeverity,
  resolveSource,
  describeError,
  DEFAULT_LABEL_NAMES,
} from './generate-v2.js';
export type { GenerateV2Options } from './generate-v2.js';
export { lookupService, lookupResourceType } from './service-lookup.js';

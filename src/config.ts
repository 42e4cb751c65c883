/**
 * Converter Configuration
 *
 * Centralizes all environment variable access for the v1 → v2 converter.
 * Command-line flags take precedence over these values.
 *
 * Environment variables:
 * - CHECKLIST_OUTPUT_DIR: Root directory for v2 files (default ./output)
 * - CHECKLIST_OUTPUT_FORMAT: yaml | yml | json (default yaml)
 * - CHECKLIST_OVERWRITE: Set to 'true' to replace existing v2 files
 * - CHECKLIST_VERBOSE: Set to 'true' for DEBUG output
 * - CHECKLIST_SERVICE_DICTIONARY: Path to a JSON/YAML service dictionary (optional)
 * - CHECKLIST_EXTRA_LABELS: Labels added to every record, JSON or "k=v,k=v" (optional)
 * - CHECKLIST_ID_LABEL / CHECKLIST_CATEGORY_LABEL / CHECKLIST_SUBCATEGORY_LABEL:
 *   Label key names (default id / area / subarea)
 */

import 'dotenv/config';

export interface ConvertConfig {
  outputDir: string;
  outputFormat: string;
  overwrite: boolean;
  verbose: boolean;
  serviceDictionaryPath: string | undefined;
  extraLabels: string | undefined;
  labelNames: {
    id: string;
    category: string;
    subcategory: string;
  };
}

type Env = Record<string, string | undefined>;

function optionalEnv(env: Env, key: string, fallback = ''): string {
  return env[key] || fallback;
}

/** Builds the configuration from an environment map (process.env by default) */
export function loadConvertConfig(env: Env = process.env): ConvertConfig {
  return {
    outputDir: optionalEnv(env, 'CHECKLIST_OUTPUT_DIR', './output'),
    outputFormat: optionalEnv(env, 'CHECKLIST_OUTPUT_FORMAT', 'yaml'),
    overwrite: env.CHECKLIST_OVERWRITE === 'true',
    verbose: env.CHECKLIST_VERBOSE === 'true',
    serviceDictionaryPath: env.CHECKLIST_SERVICE_DICTIONARY || undefined,
    extraLabels: env.CHECKLIST_EXTRA_LABELS || undefined,
    labelNames: {
      id: optionalEnv(env, 'CHECKLIST_ID_LABEL', 'id'),
      category: optionalEnv(env, 'CHECKLIST_CATEGORY_LABEL', 'area'),
      subcategory: optionalEnv(env, 'CHECKLIST_SUBCATEGORY_LABEL', 'subarea'),
    },
  };
}

export const convertConfig: ConvertConfig = loadConvertConfig();

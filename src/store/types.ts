/**
 * Record Store Types
 */

export const OUTPUT_FORMATS = ['yaml', 'yml', 'json'] as const;

/** `yml` is accepted as an alias and written with the .yaml extension */
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export interface StoreV2Options {
  /** Default: yaml */
  format?: string;
  /** Replace an existing file with the same GUID anywhere under the output root */
  overwrite?: boolean;
  verbose?: boolean;
}

export interface StoreResult {
  /** Paths written, in record order */
  written: string[];
  /** Existing files that blocked a write because overwrite was off */
  conflicts: string[];
  /** Records dropped for lacking a GUID or failing to write */
  skipped: number;
}

/** Directory used for records without a service */
export const CROSS_SERVICE_DIR = 'cross-service';

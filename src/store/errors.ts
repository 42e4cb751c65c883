// ============================================================================
// Store Error Types
// ============================================================================

/**
 * Thrown when records are asked to be written in a format other than
 * yaml/yml/json. This is a configuration mistake, so it stops the whole
 * store operation instead of skipping a record.
 */
export class UnsupportedFormatError extends Error {
  readonly format: string;

  constructor(format: string) {
    super(`Unsupported output format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

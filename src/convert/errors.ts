// ============================================================================
// Convert Error Types
// ============================================================================

/**
 * Thrown for invalid command-line usage (unknown flag, missing value,
 * malformed labels). The CLI prints the message and exits with code 1.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

// ============================================================================
// Checklist Error Types — Typed errors for unusable conversion input
// ============================================================================

/**
 * Thrown when a v1 document cannot be converted as a whole
 * (no `items` array at the top level).
 */
export class ChecklistInputError extends Error {
  readonly inputFile: string;

  constructor(message: string, inputFile: string) {
    super(message);
    this.name = 'ChecklistInputError';
    this.inputFile = inputFile;
  }
}

/**
 * Thrown when a service dictionary file is missing, unparseable, or does not
 * match the expected `{ names, service, arm }[]` shape.
 */
export class ServiceDictionaryError extends Error {
  readonly dictionaryFile: string;

  constructor(message: string, dictionaryFile: string) {
    super(message);
    this.name = 'ServiceDictionaryError';
    this.dictionaryFile = dictionaryFile;
  }
}

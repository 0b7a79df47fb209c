/**
 * Failures raised by discovery and graph assembly. Dangling references are
 * not errors; they end up as diagnostics on the built graph.
 */

/**
 * A discovered record is missing a field its shape requires, or the field
 * has the wrong type.
 */
export class MalformedRecordError extends Error {
  constructor(
    public readonly field: string,
    public readonly location: string,
    detail?: string
  ) {
    super(`Malformed record at ${location}: field "${field}" ${detail ?? 'is missing'}`);
    this.name = 'MalformedRecordError';
  }
}

/**
 * The top-level value matches none of the known document shapes.
 */
export class UnrecognizedDocumentError extends Error {
  constructor(public readonly reason: string) {
    super(`Unrecognized document: ${reason}`);
    this.name = 'UnrecognizedDocumentError';
  }
}

export class AlreadyFinalizedError extends Error {
  constructor() {
    super('GraphBuilder has already been finalized; add() is no longer accepted');
    this.name = 'AlreadyFinalizedError';
  }
}

/**
 * The input file could not be read or is not valid JSON.
 */
export class DocumentReadError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Could not load ${path}: ${detail}`, { cause });
    this.name = 'DocumentReadError';
  }
}

/*
Incident RAG - Error taxonomy
GPL-2.0-only
*/

export type IncidentRagErrorKind =
  | "source_not_found"
  | "unsupported_format"
  | "embedding_degraded"
  | "store_conflict"
  | "store_failure"
  | "no_data";

export class IncidentRagError extends Error {
  readonly kind: IncidentRagErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    kind: IncidentRagErrorKind,
    options?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.kind = kind;
    this.details = options?.details;
  }
}

export class SourceNotFoundError extends IncidentRagError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "source_not_found", options);
  }
}

export class UnsupportedFormatError extends IncidentRagError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "unsupported_format", options);
  }
}

/** Raised internally by a provider for one text; callers substitute a zero vector. */
export class EmbeddingDegradedError extends IncidentRagError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "embedding_degraded", options);
  }
}

export class StoreConflictError extends IncidentRagError {
  readonly ids: readonly string[];

  constructor(ids: readonly string[], options?: { cause?: unknown }) {
    super(`Duplicate ids in collection: ${ids.slice(0, 5).join(", ")}${ids.length > 5 ? ", ..." : ""}`, "store_conflict", {
      details: { ids: ids.length },
      cause: options?.cause,
    });
    this.ids = ids;
  }
}

export class StoreFailureError extends IncidentRagError {
  constructor(message: string, options?: { details?: Record<string, unknown>; cause?: unknown }) {
    super(message, "store_failure", options);
  }
}

export class NoDataError extends IncidentRagError {
  constructor(message: string, options?: { details?: Record<string, unknown> }) {
    super(message, "no_data", options);
  }
}

/** Message and stack of an error, in the shape the engine envelopes carry. */
export function describeError(error: unknown): { error: string; traceback?: string } {
  if (error instanceof Error) {
    return error.stack ? { error: error.message, traceback: error.stack } : { error: error.message };
  }
  return { error: String(error) };
}

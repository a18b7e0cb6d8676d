import type { ToolRunResult } from "./types.js";
import { textResult } from "./responses.js";

/**
 * `validation`: the arguments were rejected before the engine ran.
 * `engine`: the engine answered with an error envelope.
 * `unknown`: anything thrown on the way.
 */
export type ToolErrorKind = "validation" | "engine" | "unknown";

export interface ToolErrorMetadata {
  readonly kind: ToolErrorKind;
  readonly path?: string;
  readonly details?: Record<string, unknown>;
}

export class ToolValidationError extends Error {
  readonly kind = "validation";
  /** JSON path of the offending argument, e.g. `$.top_k`. */
  readonly path?: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options?: { path?: string; details?: Record<string, unknown> }) {
    super(message);
    this.name = "ToolValidationError";
    this.path = options?.path;
    this.details = options?.details;
  }
}

export function validationErrorResult(error: ToolValidationError): ToolRunResult {
  const metadata: ToolErrorMetadata = {
    kind: error.kind,
    ...(error.path !== undefined ? { path: error.path } : {}),
    ...(error.details !== undefined ? { details: error.details } : {}),
  };
  const message = error.path ? `${error.message} (at ${error.path})` : error.message;
  return { ...textResult(message, { error: metadata }), isError: true };
}

export function unknownErrorResult(error: unknown): ToolRunResult {
  if (error instanceof ToolValidationError) {
    return validationErrorResult(error);
  }
  const metadata: ToolErrorMetadata = { kind: "unknown" };
  const message = error instanceof Error ? error.message : String(error);
  return { ...textResult(message, { error: metadata }), isError: true };
}

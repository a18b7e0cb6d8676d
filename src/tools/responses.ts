import type { ToolErrorMetadata } from "./errors.js";
import type { ToolRunResult } from "./types.js";

export function textResult(
  text: string,
  metadata?: Record<string, unknown>,
): ToolRunResult {
  return {
    content: [
      {
        type: "text",
        text,
      },
    ],
    metadata,
  };
}

export function jsonResult(
  data: unknown,
  metadata?: Record<string, unknown>,
): ToolRunResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(data, null, 2),
      },
    ],
    structuredContent: {
      type: "json",
      data,
    },
    metadata,
  };
}

/**
 * Wraps an engine envelope. Envelopes carrying `error` become error results
 * with the same JSON body, so callers see the engine's message and traceback.
 */
export function envelopeResult(envelope: object, metadata?: Record<string, unknown>): ToolRunResult {
  if (!("error" in envelope)) {
    return jsonResult(envelope, { ...metadata, success: true });
  }
  const error: ToolErrorMetadata = { kind: "engine" };
  return { ...jsonResult(envelope, { ...metadata, success: false, error }), isError: true };
}

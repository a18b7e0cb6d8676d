import { Buffer } from "node:buffer";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LEVEL: LogLevel = "info";
const ACTIVE_LEVEL = normaliseLevel(process.env.LOG_LEVEL) ?? DEFAULT_LEVEL;
const ACTIVE_THRESHOLD = LEVEL_ORDER[ACTIVE_LEVEL];
const IS_TEST_ENV = process.env.NODE_ENV === "test";

const LOGGER_CACHE = new Map<string, PrefixedLogger>();

type ConsoleMethod = (...args: unknown[]) => void;

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  error(message: string, details?: Record<string, unknown>): void;
}

export interface PrefixedLogger extends Logger {
  readonly prefix: string;
  isDebugEnabled(): boolean;
}

export function loggerFor(prefix: string): PrefixedLogger {
  const cached = LOGGER_CACHE.get(prefix);
  if (cached) {
    return cached;
  }

  const prefixed = createPrefixedLogger(prefix);
  LOGGER_CACHE.set(prefix, prefixed);
  return prefixed;
}

function createPrefixedLogger(prefix: string): PrefixedLogger {
  const render = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    if (shouldSkip(level)) {
      return;
    }
    const consoleMethod = selectConsole(level);
    const label = `[${prefix}] ${message}`;
    if (details && Object.keys(details).length > 0) {
      consoleMethod(label, details);
    } else {
      consoleMethod(label);
    }
  };

  return {
    prefix,
    debug(message, details) {
      render("debug", message, details);
    },
    info(message, details) {
      render("info", message, details);
    },
    warn(message, details) {
      render("warn", message, details);
    },
    error(message, details) {
      render("error", message, details);
    },
    isDebugEnabled() {
      return !shouldSkip("debug");
    },
  };
}

function shouldSkip(level: LogLevel): boolean {
  if (IS_TEST_ENV) {
    return true;
  }
  return LEVEL_ORDER[level] < ACTIVE_THRESHOLD;
}

function selectConsole(level: LogLevel): ConsoleMethod {
  switch (level) {
    case "debug":
      return console.debug.bind(console);
    case "info":
      return console.info.bind(console);
    case "warn":
      return console.warn.bind(console);
    case "error":
      return console.error.bind(console);
  }
}

function normaliseLevel(raw?: string): LogLevel | undefined {
  if (!raw) return undefined;
  const lowered = raw.trim().toLowerCase();
  if (lowered === "debug" || lowered === "info" || lowered === "warn" || lowered === "error") {
    return lowered;
  }
  return undefined;
}

/** Longest serialized payload written to debug logs. */
export const DEBUG_PAYLOAD_LIMIT = 2000;

/** UTF-8 size of a request or response body as it goes over the wire. */
export function payloadByteLength(payload: unknown): number {
  if (payload === null || payload === undefined) {
    return 0;
  }
  return Buffer.byteLength(serializePayload(payload), "utf8");
}

/**
 * Debug view of a payload: a detached copy of small JSON bodies, or the
 * serialized text cut to {@link DEBUG_PAYLOAD_LIMIT} characters.
 */
export function formatPayloadForDebug(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return payload;
  }
  const text = serializePayload(payload);
  if (text.length > DEBUG_PAYLOAD_LIMIT) {
    return `${text.slice(0, DEBUG_PAYLOAD_LIMIT)}... (${Buffer.byteLength(text, "utf8")} bytes)`;
  }
  if (typeof payload !== "object") {
    return payload;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function serializePayload(payload: unknown): string {
  if (typeof payload === "string") {
    return payload;
  }
  if (typeof payload === "object") {
    try {
      return JSON.stringify(payload) ?? String(payload);
    } catch {
      return String(payload);
    }
  }
  return String(payload);
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message || error.name || "Error";
    return collapseWhitespace(message);
  }
  if (error === null || error === undefined) {
    return "unknown error";
  }
  return collapseWhitespace(String(error));
}

/** Short keyword summary of free text for single-line log entries. */
export function summarizeText(text: string, maxWords = 6, maxLength = 64): string {
  const cleaned = text.trim().replace(/\s+/g, " ");
  if (!cleaned) return "";
  const summary = cleaned.split(" ").slice(0, maxWords).join(" ");
  return summary.length > maxLength ? `${summary.slice(0, maxLength - 3)}...` : summary;
}

function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}

import { Buffer } from "node:buffer";

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

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_LEVEL: LogLevel = "info";

const LOGGER_CACHE = new Map<string, PrefixedLogger>();

type ConsoleMethod = (...args: unknown[]) => void;

export function loggerFor(prefix: string): PrefixedLogger {
  const cached = LOGGER_CACHE.get(prefix);
  if (cached) {
    return cached;
  }
  const created = createPrefixedLogger(prefix);
  LOGGER_CACHE.set(prefix, created);
  return created;
}

function createPrefixedLogger(prefix: string): PrefixedLogger {
  const render = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    if (shouldSkip(level)) {
      return;
    }
    const write = selectConsole(level);
    const label = `[${prefix}] ${message}`;
    if (details && Object.keys(details).length > 0) {
      write(label, details);
    } else {
      write(label);
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

// Read on every call so LOG_LEVEL set by a .env file after import still applies.
function shouldSkip(level: LogLevel): boolean {
  if (process.env.NODE_ENV === "test") {
    return true;
  }
  const active = normaliseLevel(process.env.LOG_LEVEL) ?? DEFAULT_LEVEL;
  return LEVEL_ORDER[level] < LEVEL_ORDER[active];
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

export function payloadByteLength(payload: unknown): number {
  if (payload === null || payload === undefined) {
    return 0;
  }
  const buf = asBuffer(payload);
  if (buf) {
    return buf.byteLength;
  }
  if (typeof payload === "string") {
    return Buffer.byteLength(payload, "utf8");
  }
  if (typeof payload === "object") {
    try {
      return Buffer.byteLength(JSON.stringify(payload) ?? "");
    } catch {
      return Buffer.byteLength(String(payload));
    }
  }
  if (typeof payload === "number" || typeof payload === "boolean" || typeof payload === "bigint") {
    return Buffer.byteLength(String(payload));
  }
  return 0;
}

/** Debug-friendly copy of a payload: binary becomes a length marker instead of a hex dump. */
export function formatPayloadForDebug(payload: unknown): unknown {
  if (payload === null || payload === undefined) {
    return payload;
  }
  const buf = asBuffer(payload);
  if (buf) {
    return `[binary ${buf.byteLength} bytes]`;
  }
  if (typeof payload === "string") {
    return payload.length > 2048 ? `${payload.slice(0, 2045)}...` : payload;
  }
  if (typeof payload === "object") {
    try {
      return JSON.parse(JSON.stringify(payload));
    } catch {
      return String(payload);
    }
  }
  return payload;
}

function asBuffer(payload: unknown): Buffer | null {
  if (Buffer.isBuffer(payload)) {
    return payload;
  }
  if (payload instanceof ArrayBuffer) {
    return Buffer.from(payload);
  }
  if (ArrayBuffer.isView(payload)) {
    return Buffer.from(payload.buffer, payload.byteOffset, payload.byteLength);
  }
  return null;
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

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function summarizeQuery(query: string): string {
  const cleaned = query.trim().replace(/\s+/g, " ");
  if (!cleaned) return "";
  const summary = cleaned.split(" ").slice(0, 6).join(" ");
  return summary.length > 64 ? `${summary.slice(0, 61)}...` : summary;
}

import { AppError, describeError, type AppErrorMetadata } from "../errors.js";
import type { ToolRunResult } from "./types.js";

export function textResult(text: string, metadata?: Record<string, unknown>): ToolRunResult {
  return {
    content: [{ type: "text", text }],
    ...(metadata ? { metadata } : {}),
  };
}

export function jsonResult(data: unknown, metadata?: Record<string, unknown>): ToolRunResult {
  const text =
    typeof data === "string"
      ? data
      : (() => {
          try {
            return JSON.stringify(data, null, 2);
          } catch {
            return String(data);
          }
        })();

  return {
    content: [{ type: "text", text }],
    structuredContent: { type: "json", data },
    ...(metadata ? { metadata } : {}),
  };
}

/** Renders any thrown value as an `isError` result; `AppError` metadata rides along under `error`. */
export function errorResult(error: unknown): ToolRunResult {
  const metadata: AppErrorMetadata = error instanceof AppError ? error.toMetadata() : { kind: "unknown" };
  return { ...textResult(describeError(error), { error: metadata }), isError: true };
}

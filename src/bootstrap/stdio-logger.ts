import { Console } from "node:console";

const METHODS = ["log", "info", "debug", "warn", "error", "dir", "trace", "table", "group", "groupCollapsed", "groupEnd"] as const;

let redirected = false;

/**
 * Points every console method at stderr. The MCP stdio transport owns stdout,
 * so this has to run before anything logs.
 */
export function redirectConsoleToStderr(): void {
  if (redirected) return;
  redirected = true;

  const stderrConsole = new Console({ stdout: process.stderr, stderr: process.stderr });
  for (const method of METHODS) {
    const implementation = stderrConsole[method];
    console[method] = (...args: unknown[]) => {
      Reflect.apply(implementation, stderrConsole, args);
    };
  }
}

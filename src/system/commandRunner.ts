/*
 * Small spawn wrapper for the OS probes (process list, foreground window).
 */

import { spawn } from "node:child_process";

export interface CommandResult {
  command: string;
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export class CommandExecutionError extends Error {
  public readonly command: string;
  public readonly exitCode: number | null;
  public readonly stderrFirst: string;

  constructor(options: { message: string; command: string; exitCode: number | null; stderr: string }) {
    const first = options.stderr.slice(0, 500);
    super(`${options.message} (command: ${options.command}, exitCode: ${String(options.exitCode)})${first ? `: ${first}` : ""}`);
    this.name = "CommandExecutionError";
    this.command = options.command;
    this.exitCode = options.exitCode;
    this.stderrFirst = first;
  }
}

export type CommandRunner = (binary: string, args: readonly string[], options?: { timeoutMs?: number }) => Promise<CommandResult>;

/** Runs a binary to completion. Rejects when it cannot start, times out or exits non-zero. */
export const runCommand: CommandRunner = (binary, args, options = {}) => {
  const timeoutMs = options.timeoutMs ?? 5_000;
  const command = [binary, ...args].join(" ");

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(binary, [...args], { stdio: ["ignore", "pipe", "pipe"], windowsHide: true });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill();
    }, timeoutMs);
    timer.unref();

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.once("error", (error) => {
      clearTimeout(timer);
      reject(new CommandExecutionError({ message: error.message, command, exitCode: null, stderr: "" }));
    });

    child.once("close", (exitCode) => {
      clearTimeout(timer);
      const result: CommandResult = {
        command,
        exitCode,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      };
      if (timedOut) {
        reject(new CommandExecutionError({ message: `Timed out after ${timeoutMs}ms`, command, exitCode, stderr: result.stderr }));
        return;
      }
      if (exitCode !== 0) {
        reject(new CommandExecutionError({ message: "Command failed", command, exitCode, stderr: result.stderr }));
        return;
      }
      resolve(result);
    });
  });
};

import path from "node:path";
import { parseCsv } from "../rag/csv.js";
import { runCommand, type CommandRunner } from "../system/commandRunner.js";

export interface ProcessLister {
  /** Lower-cased executable base names of running processes. */
  listProcessNames(): Promise<string[]>;
}

/** `tasklist` on Windows, `ps` everywhere else. */
export class SystemProcessLister implements ProcessLister {
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(platform: NodeJS.Platform = process.platform, run: CommandRunner = runCommand) {
    this.platform = platform;
    this.run = run;
  }

  async listProcessNames(): Promise<string[]> {
    if (this.platform === "win32") {
      const { stdout } = await this.run("tasklist", ["/fo", "csv", "/nh"]);
      return parseTasklistCsv(stdout);
    }
    const { stdout } = await this.run("ps", ["-A", "-o", "comm="]);
    return parsePsOutput(stdout);
  }
}

export function parseTasklistCsv(output: string): string[] {
  return parseCsv(output)
    .map((cells) => (cells[0] ?? "").trim().toLowerCase())
    .filter((name) => name.length > 0);
}

export function parsePsOutput(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => path.posix.basename(line).toLowerCase());
}

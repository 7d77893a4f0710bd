import { readFile, writeFile } from "node:fs/promises";
import { isErrnoException } from "../errors.js";

async function readLines(filePath: string): Promise<string[]> {
  try {
    const text = await readFile(filePath, "utf-8");
    const lines = text.replace(/\r\n/g, "\n").split("\n");
    if (lines.length > 0 && lines[lines.length - 1] === "") {
      lines.pop();
    }
    return lines;
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/** Replaces the first `KEY=` line, or appends one. Other lines are kept verbatim. */
export async function upsertEnvValue(filePath: string, key: string, value: string): Promise<void> {
  const lines = await readLines(filePath);
  const prefix = `${key}=`;
  const entry = `${key}=${value}`;
  const index = lines.findIndex((line) => line.startsWith(prefix));
  if (index >= 0) {
    lines[index] = entry;
  } else {
    lines.push(entry);
  }
  await writeFile(filePath, `${lines.join("\n")}\n`, "utf-8");
}

export function maskKey(key: string): string {
  if (key.length < 8) {
    return "";
  }
  return `${key.slice(0, 4)}***${key.slice(-4)}`;
}

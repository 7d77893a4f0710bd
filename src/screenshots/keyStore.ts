import { mkdirSync, readFileSync, writeFileSync } from "node:fs";
import path from "node:path";
import { isErrnoException } from "../errors.js";
import { loggerFor } from "../logger.js";
import { Fernet } from "./fernet.js";

const log = loggerFor("screenshots");

/** Reads the Fernet key at `keyPath`, creating it (owner-only) on first use. */
export function loadOrCreateKey(keyPath: string): string {
  try {
    return readFileSync(keyPath, "ascii").trim();
  } catch (error) {
    if (!(isErrnoException(error) && error.code === "ENOENT")) {
      throw error;
    }
  }

  const key = Fernet.generateKey();
  mkdirSync(path.dirname(keyPath), { recursive: true });
  writeFileSync(keyPath, key, { encoding: "ascii", mode: 0o600, flag: "wx" });
  log.info(`created screenshot key path=${keyPath}`);
  return key;
}

import { readFileSync } from "node:fs";
import { parse as yamlParse } from "yaml";
import { ValidationError, isErrnoException } from "../errors.js";
import { loggerFor } from "../logger.js";

export interface GameMapping {
  processes: string[];
  keywords: string[];
  windowTitles: string[];
}

export type GameCatalog = Map<string, GameMapping>;

const log = loggerFor("games");

/** Parses the YAML catalog; entries keep file order, which is also detection priority. */
export function parseGameCatalog(text: string, source = "catalog"): GameCatalog {
  const document: unknown = yamlParse(text);
  const catalog: GameCatalog = new Map();
  if (document === null || document === undefined) {
    return catalog;
  }
  if (!isRecord(document)) {
    throw new ValidationError(`${source} must map game names to detection rules`);
  }

  for (const [game, rules] of Object.entries(document)) {
    if (!isRecord(rules)) {
      throw new ValidationError(`${source}: rules for ${game} must be a mapping`, { path: `$.${game}` });
    }
    catalog.set(game, {
      processes: stringList(rules.processes, `$.${game}.processes`),
      keywords: stringList(rules.keywords, `$.${game}.keywords`),
      windowTitles: stringList(rules.windowTitles, `$.${game}.windowTitles`),
    });
  }
  return catalog;
}

export function loadGameCatalog(filePath: string): GameCatalog {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      log.warn(`catalog missing path=${filePath}; game detection starts empty`);
      return new Map();
    }
    throw error;
  }
  const catalog = parseGameCatalog(text, filePath);
  log.debug(`catalog loaded path=${filePath} games=${catalog.size}`);
  return catalog;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringList(value: unknown, path: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError("Expected a list of strings", { path });
  }
  return value.map((entry: unknown, index) => {
    if (typeof entry !== "string" || !entry.trim()) {
      throw new ValidationError("Expected a non-empty string", { path: `${path}[${index}]` });
    }
    return entry.trim().toLowerCase();
  });
}

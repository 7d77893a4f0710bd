import { readFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import dotenv from "dotenv";
import { ValidationError, isErrnoException } from "./errors.js";

export type EmbeddingProvider = "local" | "gemini";

export interface GameSageConfig {
  host: string;
  port: number;
  googleApiKey?: string;
  chatModel: string;
  systemPromptPath: string;
  gamesInfoDir: string;
  catalogPath: string;
  vectorDbDir: string;
  screenshotDbPath: string;
  screenshotKeyPath: string;
  screenshotIntervalSec: number;
  envFilePath: string;
  embedding: EmbeddingProvider;
  fetchRps: number;
  fetchTimeoutMs: number;
}

const DEFAULT_CONFIG: GameSageConfig = {
  host: "127.0.0.1",
  port: 8000,
  chatModel: "gemini-2.5-flash-lite",
  systemPromptPath: "data/PROMPTS.md",
  gamesInfoDir: "data/games_info",
  catalogPath: "data/games.yaml",
  vectorDbDir: "vector_db",
  screenshotDbPath: "screenshots.db",
  screenshotKeyPath: "screenshot_key.key",
  screenshotIntervalSec: 30,
  envFilePath: ".env",
  embedding: "local",
  fetchRps: 1,
  fetchTimeoutMs: 10_000,
};

let cachedConfig: GameSageConfig | null = null;

export interface LoadConfigOptions {
  /** Defaults to process.env; tests pass their own map. */
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** Skip reading the .env file (tests). */
  skipEnvFile?: boolean;
}

export function loadConfig(options: LoadConfigOptions = {}): GameSageConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  if (!options.skipEnvFile) {
    applyEnvFile(env, path.resolve(cwd, configuredString(env.GAME_SAGE_ENV_FILE) ?? DEFAULT_CONFIG.envFilePath));
  }

  const raw = readConfigFile(env, cwd);

  const config: GameSageConfig = {
    host: firstDefined(configuredString(env.HOST), configuredString(raw.host)) ?? DEFAULT_CONFIG.host,
    port: firstDefined(configuredPort(env.PORT), configuredPort(raw.port)) ?? DEFAULT_CONFIG.port,
    googleApiKey: firstDefined(configuredString(env.GOOGLE_API_KEY), configuredString(raw.googleApiKey)),
    chatModel:
      firstDefined(configuredString(env.GAME_SAGE_CHAT_MODEL), configuredString(raw.chatModel)) ?? DEFAULT_CONFIG.chatModel,
    systemPromptPath: resolvePath(cwd, configuredString(raw.systemPromptPath) ?? DEFAULT_CONFIG.systemPromptPath),
    gamesInfoDir: resolvePath(
      cwd,
      firstDefined(configuredString(env.GAME_SAGE_GAMES_DIR), configuredString(raw.gamesInfoDir)) ?? DEFAULT_CONFIG.gamesInfoDir,
    ),
    catalogPath: resolvePath(cwd, configuredString(raw.catalogPath) ?? DEFAULT_CONFIG.catalogPath),
    vectorDbDir: resolvePath(
      cwd,
      firstDefined(configuredString(env.GAME_SAGE_VECTOR_DIR), configuredString(raw.vectorDbDir)) ?? DEFAULT_CONFIG.vectorDbDir,
    ),
    screenshotDbPath: resolvePath(
      cwd,
      firstDefined(configuredString(env.GAME_SAGE_SCREENSHOT_DB), configuredString(raw.screenshotDbPath)) ??
        DEFAULT_CONFIG.screenshotDbPath,
    ),
    screenshotKeyPath: resolvePath(cwd, configuredString(raw.screenshotKeyPath) ?? DEFAULT_CONFIG.screenshotKeyPath),
    screenshotIntervalSec:
      firstDefined(configuredPositive(env.GAME_SAGE_SCREENSHOT_INTERVAL), configuredPositive(raw.screenshotIntervalSec)) ??
      DEFAULT_CONFIG.screenshotIntervalSec,
    envFilePath: resolvePath(cwd, configuredString(env.GAME_SAGE_ENV_FILE) ?? DEFAULT_CONFIG.envFilePath),
    embedding:
      firstDefined(configuredEmbedding(env.GAME_SAGE_EMBEDDING), configuredEmbedding(raw.embedding)) ?? DEFAULT_CONFIG.embedding,
    fetchRps: configuredPositive(raw.fetchRps) ?? DEFAULT_CONFIG.fetchRps,
    fetchTimeoutMs: configuredPositive(raw.fetchTimeoutMs) ?? DEFAULT_CONFIG.fetchTimeoutMs,
  };

  cachedConfig = config;
  return config;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

function readConfigFile(env: NodeJS.ProcessEnv, cwd: string): Record<string, unknown> {
  const home = os.homedir();
  const candidates = [
    configuredString(env.GAME_SAGE_CONFIG),
    home ? path.join(home, ".game-sage.json") : undefined,
    path.join(cwd, ".game-sage.json"),
  ];

  for (const candidate of candidates) {
    if (!candidate) continue;
    let text: string;
    try {
      text = readFileSync(candidate, "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        continue;
      }
      throw error;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new ValidationError(`Config file ${candidate} is not valid JSON`, { cause: error });
    }
    if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
      throw new ValidationError(`Config file ${candidate} must contain a JSON object`);
    }
    return { ...parsed };
  }
  return {};
}

/** Values already present in the environment win over the .env file. */
function applyEnvFile(env: NodeJS.ProcessEnv, envPath: string): void {
  let text: string;
  try {
    text = readFileSync(envPath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }
    throw error;
  }
  for (const [key, value] of Object.entries(dotenv.parse(text))) {
    if (env[key] === undefined) {
      env[key] = value;
    }
  }
}

function resolvePath(cwd: string, value: string): string {
  return path.resolve(cwd, value);
}

function configuredString(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function configuredNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function configuredPort(value: unknown): number | undefined {
  const parsed = configuredNumber(value);
  if (parsed !== undefined && Number.isInteger(parsed) && parsed > 0 && parsed <= 65_535) {
    return parsed;
  }
  return undefined;
}

function configuredPositive(value: unknown): number | undefined {
  const parsed = configuredNumber(value);
  return parsed !== undefined && parsed > 0 ? parsed : undefined;
}

function configuredEmbedding(value: unknown): EmbeddingProvider | undefined {
  const lowered = configuredString(value)?.toLowerCase();
  return lowered === "local" || lowered === "gemini" ? lowered : undefined;
}

function firstDefined<T>(...values: Array<T | undefined>): T | undefined {
  for (const value of values) {
    if (value !== undefined && value !== null) return value;
  }
  return undefined;
}

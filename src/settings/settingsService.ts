import { UnavailableError, ValidationError } from "../errors.js";
import { loggerFor, type PrefixedLogger } from "../logger.js";
import { maskKey, upsertEnvValue } from "./envFile.js";

export const API_KEY_VARIABLE = "GOOGLE_API_KEY";

export interface ApiKeyTarget {
  setApiKey(apiKey: string): boolean;
}

export interface ApiKeyStatus {
  configured: boolean;
  preview: string;
}

export interface SettingsServiceOptions {
  envFilePath: string;
  model: ApiKeyTarget;
  /** Key resolved by the loaded configuration; falls back to `GOOGLE_API_KEY` in `env`. */
  apiKey?: string;
  env?: NodeJS.ProcessEnv;
  logger?: PrefixedLogger;
}

export class SettingsService {
  private readonly envFilePath: string;
  private readonly model: ApiKeyTarget;
  private readonly env: NodeJS.ProcessEnv;
  private readonly log: PrefixedLogger;
  private apiKey: string;

  constructor(options: SettingsServiceOptions) {
    this.envFilePath = options.envFilePath;
    this.model = options.model;
    this.env = options.env ?? process.env;
    this.log = options.logger ?? loggerFor("settings");
    this.apiKey = options.apiKey ?? this.env[API_KEY_VARIABLE] ?? "";
  }

  apiKeyStatus(): ApiKeyStatus {
    return { configured: this.apiKey.length > 0, preview: maskKey(this.apiKey) };
  }

  /** Persists the key to the env file, then applies it to the running chat model. */
  async updateApiKey(rawKey: string): Promise<ApiKeyStatus> {
    const key = rawKey.trim();
    if (!key) {
      throw new ValidationError("API key cannot be empty", { path: "$.api_key" });
    }

    await upsertEnvValue(this.envFilePath, API_KEY_VARIABLE, key);
    this.env[API_KEY_VARIABLE] = key;
    this.apiKey = key;

    if (!this.model.setApiKey(key)) {
      throw new UnavailableError("Failed to apply API key to the chat model");
    }
    this.log.info(`api key updated file=${this.envFilePath} preview=${maskKey(key)}`);
    return this.apiKeyStatus();
  }
}

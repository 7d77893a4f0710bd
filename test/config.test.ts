import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, resetConfigCache } from "../src/config.js";
import { ValidationError } from "../src/errors.js";

describe("loadConfig", () => {
  let dir: string;
  let configFile: string;

  beforeEach(() => {
    resetConfigCache();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-"));
    configFile = path.join(dir, "game-sage.json");
    fs.writeFileSync(configFile, "{}");
  });

  afterEach(() => {
    resetConfigCache();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults resolved against the working directory", () => {
    const config = loadConfig({ env: { GAME_SAGE_CONFIG: configFile }, cwd: dir, skipEnvFile: true });
    expect(config).toMatchObject({
      host: "127.0.0.1",
      port: 8000,
      embedding: "local",
      screenshotIntervalSec: 30,
      gamesInfoDir: path.join(dir, "data", "games_info"),
      vectorDbDir: path.join(dir, "vector_db"),
      envFilePath: path.join(dir, ".env"),
    });
    expect(config.googleApiKey).toBeUndefined();
  });

  it("lets environment variables override the config file", () => {
    fs.writeFileSync(configFile, JSON.stringify({ host: "0.0.0.0", port: 9000, chatModel: "gemini-test", fetchRps: 3 }));
    const config = loadConfig({
      env: { GAME_SAGE_CONFIG: configFile, PORT: "8123", GAME_SAGE_EMBEDDING: "Gemini" },
      cwd: dir,
      skipEnvFile: true,
    });
    expect(config).toMatchObject({ host: "0.0.0.0", port: 8123, chatModel: "gemini-test", embedding: "gemini", fetchRps: 3 });
  });

  it("ignores values that do not parse", () => {
    fs.writeFileSync(configFile, JSON.stringify({ port: 9000 }));
    const config = loadConfig({
      env: { GAME_SAGE_CONFIG: configFile, PORT: "not-a-port", GAME_SAGE_EMBEDDING: "openai", GAME_SAGE_SCREENSHOT_INTERVAL: "-5" },
      cwd: dir,
      skipEnvFile: true,
    });
    expect(config).toMatchObject({ port: 9000, embedding: "local", screenshotIntervalSec: 30 });
  });

  it("reads the .env file without overriding the environment", () => {
    fs.writeFileSync(path.join(dir, ".env"), "GOOGLE_API_KEY=test-secret\nHOST=10.0.0.5\n");
    const env: NodeJS.ProcessEnv = { GAME_SAGE_CONFIG: configFile, HOST: "127.0.0.2" };
    const config = loadConfig({ env, cwd: dir });
    expect(config.googleApiKey).toBe("test-secret");
    expect(config.host).toBe("127.0.0.2");
    expect(env.GOOGLE_API_KEY).toBe("test-secret");
  });

  it("caches the first result until reset", () => {
    const first = loadConfig({ env: { GAME_SAGE_CONFIG: configFile }, cwd: dir, skipEnvFile: true });
    expect(loadConfig({ env: { GAME_SAGE_CONFIG: configFile, PORT: "9999" }, cwd: dir, skipEnvFile: true })).toBe(first);
    resetConfigCache();
    expect(loadConfig({ env: { GAME_SAGE_CONFIG: configFile, PORT: "9999" }, cwd: dir, skipEnvFile: true }).port).toBe(9999);
  });

  it("rejects a config file that is not a JSON object", () => {
    fs.writeFileSync(configFile, "[1, 2]");
    expect(() => loadConfig({ env: { GAME_SAGE_CONFIG: configFile }, cwd: dir, skipEnvFile: true })).toThrow(ValidationError);
    fs.writeFileSync(configFile, "{ nope");
    expect(() => loadConfig({ env: { GAME_SAGE_CONFIG: configFile }, cwd: dir, skipEnvFile: true })).toThrow(
      `Config file ${configFile} is not valid JSON`,
    );
  });
});

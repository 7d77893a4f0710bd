import fs from "node:fs";
import path from "node:path";
import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createApp } from "../src/server/app.js";
import { createTestServices, GAME_WINDOW, type TestServices } from "./support/services.js";

describe("HTTP API", () => {
  let ctx: TestServices;
  let app: FastifyInstance;
  let savedApiKey: string | undefined;

  beforeEach(async () => {
    savedApiKey = process.env.GOOGLE_API_KEY;
    ctx = await createTestServices();
    app = await createApp(ctx.services);
  });

  afterEach(async () => {
    await app.close();
    await ctx.cleanup();
    if (savedApiKey === undefined) {
      delete process.env.GOOGLE_API_KEY;
    } else {
      process.env.GOOGLE_API_KEY = savedApiKey;
    }
  });

  it("answers health checks and unknown routes", async () => {
    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.statusCode).toBe(200);
    expect(health.json()).toEqual({ status: "ok" });

    const missing = await app.inject({ method: "GET", url: "/nowhere" });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toEqual({ detail: "Not Found" });
  });

  describe("chat", () => {
    it("replies through the chat model", async () => {
      const response = await app.inject({ method: "POST", url: "/chat", payload: { message: "How to beat Margit in Elden Ring?" } });
      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ response: "Try bleed." });
      expect(ctx.model.calls).toEqual([[{ text: "How to beat Margit in Elden Ring?\n\nDETECTED GAME: ELDEN_RING" }]]);
    });

    it("rejects a body without a message", async () => {
      const response = await app.inject({ method: "POST", url: "/chat", payload: { image_data: "aGVsbG8=" } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Missing required property (at $.message)" });
    });

    it("rejects malformed JSON", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/chat",
        headers: { "content-type": "application/json" },
        payload: "{ not json",
      });
      expect(response.statusCode).toBe(400);
    });
  });

  describe("screenshots", () => {
    it("serves stored screenshots", async () => {
      ctx.services.screenshots.saveScreenshot(Buffer.from("frame"), GAME_WINDOW);

      const recent = await app.inject({ method: "GET", url: "/screenshots/recent?limit=5&application=eldenring.exe" });
      expect(recent.statusCode).toBe(200);
      expect(recent.json()).toMatchObject({
        status: "ok",
        screenshots: [{ id: 1, application: "eldenring.exe", window_title: "ELDEN RING" }],
      });

      const image = await app.inject({ method: "GET", url: "/screenshots/1" });
      expect(image.json()).toEqual({ status: "ok", data: "ZnJhbWU=" });

      const stats = await app.inject({ method: "GET", url: "/screenshots/stats" });
      expect(stats.json()).toMatchObject({ status: "ok", stats: { total_screenshots: 1, applications: [["eldenring.exe", 1]] } });
    });

    it("deletes screenshots and reports missing ones", async () => {
      ctx.services.screenshots.saveScreenshot(Buffer.from("frame"), GAME_WINDOW);

      const deleted = await app.inject({ method: "DELETE", url: "/screenshots/1" });
      expect(deleted.json()).toEqual({ status: "ok", message: "Deleted screenshot 1" });

      const again = await app.inject({ method: "DELETE", url: "/screenshots/1" });
      expect(again.statusCode).toBe(404);
      expect(again.json()).toEqual({ detail: "Screenshot not found" });

      const image = await app.inject({ method: "GET", url: "/screenshots/1" });
      expect(image.statusCode).toBe(404);
    });

    it("validates ids and query parameters", async () => {
      const badId = await app.inject({ method: "GET", url: "/screenshots/latest" });
      expect(badId.statusCode).toBe(400);
      expect(badId.json()).toEqual({ detail: "Expected a number (at $.id)" });

      const badLimit = await app.inject({ method: "GET", url: "/screenshots/recent?limit=0" });
      expect(badLimit.statusCode).toBe(400);
      expect(badLimit.json()).toEqual({ detail: "Value is below minimum (at $.limit)" });

      const badDate = await app.inject({ method: "GET", url: "/screenshots/recent?end_date=yesterday" });
      expect(badDate.statusCode).toBe(400);
      expect(badDate.json()).toEqual({ detail: "Invalid date: yesterday (at $.endDate)" });
    });

    it("starts and stops the capture loop", async () => {
      const started = await app.inject({ method: "POST", url: "/screenshots/start?interval=60" });
      expect(started.json()).toEqual({ status: "ok", message: "Screenshot capture started with 60s interval" });
      expect(ctx.services.capture.isRunning()).toBe(true);
      expect(ctx.services.capture.interval).toBe(60);

      await ctx.services.capture.idle();
      expect(ctx.services.screenshots.getStats().total_screenshots).toBe(1);

      const stopped = await app.inject({ method: "POST", url: "/screenshots/stop" });
      expect(stopped.json()).toEqual({ status: "ok", message: "Screenshot capture stopped" });
      expect(ctx.services.capture.isRunning()).toBe(false);
    });

    it("uses the default interval when none is given", async () => {
      const started = await app.inject({ method: "POST", url: "/screenshots/start" });
      expect(started.json()).toEqual({ status: "ok", message: "Screenshot capture started with 30s interval" });
    });
  });

  describe("games", () => {
    it("detects games from a message or reports none", async () => {
      const named = await app.inject({ method: "POST", url: "/games/detect", payload: { message: "any good minecraft seeds?" } });
      expect(named.json()).toEqual({ status: "ok", detected_game: "minecraft", message: "Detected game: minecraft" });

      const none = await app.inject({ method: "POST", url: "/games/detect" });
      expect(none.json()).toEqual({ status: "ok", detected_game: null, message: "No game detected" });
    });

    it("lists known games from each source", async () => {
      const response = await app.inject({ method: "GET", url: "/games/list" });
      expect(response.json()).toEqual({
        status: "ok",
        detection_games: ["minecraft", "elden_ring", "dark_souls_3"],
        csv_games: ["elden_ring"],
        vector_games: [],
      });
    });

    it("processes, searches and deletes a game's knowledge", async () => {
      const validate = await app.inject({ method: "GET", url: "/games/elden_ring/knowledge/validate" });
      expect(validate.json()).toEqual({ status: "ok", game_name: "elden_ring", is_valid: true, errors: [] });

      const processed = await app.inject({ method: "POST", url: "/games/elden_ring/knowledge/process" });
      expect(processed.statusCode).toBe(200);
      expect(processed.json()).toEqual({
        status: "ok",
        message: "Successfully processed knowledge for elden_ring",
        stats: { wiki: 1, youtube: 1, forum: 1 },
      });

      const search = await app.inject({
        method: "POST",
        url: "/games/elden_ring/knowledge/search",
        payload: { query: "bleed", content_types: ["wiki"] },
      });
      const body = search.json();
      expect(body).toMatchObject({ status: "ok", game_name: "elden_ring", query: "bleed", total_results: 1 });
      expect(body.results[0]).toMatchObject({
        content_type: "wiki",
        content: "Margit the Fell Omen guards Stormveil Castle. He is weak to bleed and jump attacks..",
        metadata: { title: "Margit Guide", url: "https://wiki.example/margit" },
      });

      const list = await app.inject({ method: "GET", url: "/games/list" });
      expect(list.json()).toMatchObject({ vector_games: ["elden_ring"] });

      const deleted = await app.inject({ method: "DELETE", url: "/games/elden_ring/knowledge" });
      expect(deleted.json()).toEqual({ status: "ok", message: "Deleted knowledge for elden_ring" });

      const stats = await app.inject({ method: "GET", url: "/games/elden_ring/knowledge/stats" });
      expect(stats.json()).toEqual({ status: "ok", game_name: "elden_ring", stats: { wiki: 0, youtube: 0, forum: 0 } });
    });

    it("refuses to process a game without a valid CSV", async () => {
      const response = await app.inject({ method: "POST", url: "/games/hollow_knight/knowledge/process" });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Invalid CSV structure: CSV file not found" });
    });

    it("rejects game names outside the allowed characters", async () => {
      const response = await app.inject({ method: "GET", url: "/games/elden.ring/knowledge/stats" });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "String does not match required pattern (at $.game)" });
    });

    it("validates search bodies", async () => {
      const response = await app.inject({
        method: "POST",
        url: "/games/elden_ring/knowledge/search",
        payload: { query: "bleed", content_types: ["blog"] },
      });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "Value must be one of the allowed options (at $.content_types[0])" });
    });
  });

  describe("settings", () => {
    it("stores a new API key and reports it masked", async () => {
      const update = await app.inject({ method: "POST", url: "/settings/api-key", payload: { api_key: "test-secret-value" } });
      expect(update.json()).toEqual({ status: "ok", message: "API key updated" });
      expect(fs.readFileSync(path.join(ctx.dir, ".env"), "utf-8")).toBe("GOOGLE_API_KEY=test-secret-value\n");
      expect(ctx.model.keys).toEqual(["test-secret-value"]);

      const status = await app.inject({ method: "GET", url: "/settings/api-key" });
      expect(status.json()).toEqual({ status: "ok", configured: true, preview: "test***alue" });
    });

    it("rejects an empty key", async () => {
      const response = await app.inject({ method: "POST", url: "/settings/api-key", payload: { api_key: "  " } });
      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({ detail: "API key cannot be empty (at $.api_key)" });
    });
  });
});

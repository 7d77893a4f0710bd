import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createMcpServer, handleToolCall } from "../src/mcp-server.js";
import { describeToolModules, toolRegistry } from "../src/tools/registry.js";
import { createTestServices, GAME_WINDOW, type TestServices } from "./support/services.js";

describe("tool registry", () => {
  it("lists every tool with its module metadata", () => {
    expect(toolRegistry.list().map((tool) => tool.name)).toEqual([
      "game_chat",
      "detect_game",
      "knowledge_search",
      "knowledge_stats",
      "screenshots_recent",
      "screenshot_stats",
    ]);

    const search = toolRegistry.list().find((tool) => tool.name === "knowledge_search");
    expect(search?.inputSchema.required).toEqual(["game", "query"]);
    expect(search?.metadata).toMatchObject({ domain: "knowledge", tags: ["knowledge", "rag", "search"] });
  });

  it("groups tools by domain", () => {
    expect(describeToolModules().map((module) => [module.domain, module.tools.length])).toEqual([
      ["assistant", 2],
      ["knowledge", 2],
      ["screenshots", 2],
    ]);
  });
});

describe("tool calls", () => {
  let ctx: TestServices;

  beforeEach(async () => {
    ctx = await createTestServices();
  });

  afterEach(async () => {
    await ctx.cleanup();
  });

  it("chats through the assistant", async () => {
    expect(await handleToolCall(ctx.services, "game_chat", { message: "hello" })).toEqual({
      content: [{ type: "text", text: "Try bleed." }],
      metadata: { success: true },
    });
  });

  it("detects the game named in a message", async () => {
    const data = { detected_game: "dark_souls_3", message: "Detected game: dark_souls_3" };
    expect(await handleToolCall(ctx.services, "detect_game", { message: "ds3 boss order?" })).toEqual({
      content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
      structuredContent: { type: "json", data },
      metadata: { success: true },
    });
  });

  it("searches processed knowledge", async () => {
    expect(await ctx.services.vectors.addGameKnowledge("elden_ring")).toBe(true);

    const response = await handleToolCall(ctx.services, "knowledge_search", {
      game: "elden_ring",
      query: "bleed katana",
      content_types: ["forum"],
      limit: 1,
    });

    expect(response.isError).toBeUndefined();
    expect(response.metadata).toEqual({ success: true, count: 1 });
    expect(response.structuredContent?.data).toMatchObject({
      game: "elden_ring",
      query: "bleed katana",
      results: [
        {
          title: "Forum thread",
          url: "https://forum.example/margit",
          content_type: "forum",
          content: "Use a bleed katana and summon jellyfish ashes. Jump attacks stagger him quickly, too..",
        },
      ],
    });

    const stats = await handleToolCall(ctx.services, "knowledge_stats", { game: "elden_ring" });
    expect(stats.structuredContent?.data).toEqual({ game_name: "elden_ring", stats: { wiki: 1, youtube: 1, forum: 1 } });
  });

  it("reports invalid arguments as tool errors", async () => {
    expect(await handleToolCall(ctx.services, "knowledge_search", { game: "elden_ring" })).toEqual({
      content: [{ type: "text", text: "Missing required property (at $.query)" }],
      metadata: { error: { kind: "validation", path: "$.query" } },
      isError: true,
    });
  });

  it("reports unknown tools as tool errors", async () => {
    expect(await handleToolCall(ctx.services, "launch_game", {})).toEqual({
      content: [{ type: "text", text: "Unknown tool: launch_game" }],
      metadata: { error: { kind: "unknown" } },
      isError: true,
    });
  });

  it("reads the screenshot archive", async () => {
    ctx.services.screenshots.saveScreenshot(Buffer.from("frame"), GAME_WINDOW);

    const recent = await handleToolCall(ctx.services, "screenshots_recent", { application: "eldenring.exe" });
    expect(recent.metadata).toEqual({ success: true, count: 1 });

    const stats = await handleToolCall(ctx.services, "screenshot_stats", {});
    expect(stats.structuredContent?.data).toMatchObject({ stats: { total_screenshots: 1 } });

    const invalid = await handleToolCall(ctx.services, "screenshots_recent", { limit: 0 });
    expect(invalid.isError).toBe(true);
  });

  it("serves tools over an MCP transport", async () => {
    const server = createMcpServer(ctx.services);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    const client = new Client({ name: "test-client", version: "1.0.0" });
    await client.connect(clientTransport);

    try {
      const { tools } = await client.listTools();
      expect(tools.map((tool) => tool.name)).toContain("knowledge_search");

      const result = await client.callTool({ name: "game_chat", arguments: { message: "hello" } });
      expect(result.content).toEqual([{ type: "text", text: "Try bleed." }]);
    } finally {
      await client.close();
      await server.close();
    }
  });
});

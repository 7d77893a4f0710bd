import { readFile } from "node:fs/promises";
import { isErrnoException } from "../errors.js";
import type { KnowledgeHit } from "../rag/types.js";
import type { ScreenshotStats, ScreenshotSummary } from "../screenshots/types.js";

export const SCREENSHOT_KEYWORDS = ["screenshot", "screen", "capture", "visual", "see", "show me"] as const;

const SNIPPET_LENGTH = 200;

export async function loadSystemPrompt(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return "";
    }
    throw error;
  }
}

/** Substring match, so plurals and inflections ("screenshots", "captured") count. */
export function mentionsScreenshots(message: string): boolean {
  const lowered = message.toLowerCase();
  return SCREENSHOT_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

function gameLine(game: string): string {
  return `DETECTED GAME: ${game.toUpperCase()}`;
}

export function buildImagePrompt(message: string, game: string | null): string {
  const lines = [
    message,
    "",
    "LIVE SCREENSHOT PROVIDED: I can see a screenshot that the user just captured.",
    "Please analyze this image in the context of gaming and provide specific, actionable advice based on what you can see.",
    "Focus on game mechanics, strategies, UI elements, or any gaming-related aspects visible in the screenshot.",
  ];
  if (game) {
    lines.push("", gameLine(game));
  }
  return lines.join("\n");
}

export function buildScreenshotPrompt(message: string, stats: ScreenshotStats, recent: readonly ScreenshotSummary[]): string {
  const applications = stats.applications.slice(0, 5).map(([name]) => name);
  const recentLines = recent.length
    ? recent.map((shot) => `  - #${shot.id} ${shot.timestamp} ${shot.application}${shot.window_title ? ` "${shot.window_title}"` : ""}`)
    : ["  - none"];

  return [
    message,
    "",
    "SCREENSHOT DATA AVAILABLE:",
    `- Total screenshots stored: ${stats.total_screenshots}`,
    `- Recent applications captured: ${applications.length ? applications.join(", ") : "none"}`,
    "- Recent screenshots:",
    ...recentLines,
    "",
    "You can analyze these screenshots to help with gaming-related questions.",
    "The screenshots are automatically captured and show what applications the user was using.",
  ].join("\n");
}

export function buildKnowledgePrompt(message: string, game: string | null, hits: readonly KnowledgeHit[]): string {
  if (!game) {
    return message;
  }
  let prompt = `${message}\n\n${gameLine(game)}`;
  if (hits.length === 0) {
    return prompt;
  }

  prompt += "\n\nRELEVANT KNOWLEDGE FROM GAME DATABASE:\n";
  hits.forEach((hit, index) => {
    prompt += `\n${index + 1}. ${hit.metadata.title || "Unknown Title"}\n`;
    prompt += `   Source: ${hit.content_type.toUpperCase()}\n`;
    prompt += `   Content: ${hit.content.slice(0, SNIPPET_LENGTH)}...\n`;
    prompt += `   URL: ${hit.metadata.url || "N/A"}\n`;
  });
  return prompt;
}

import { DEFAULT_SCREENSHOT_LIMIT } from "../screenshots/screenshotStore.js";
import { defineToolModule, type ToolExecutionContext } from "./types.js";
import { integerSchema, objectSchema, optionalSchema, stringSchema } from "./schema.js";
import { errorResult, jsonResult } from "./responses.js";

interface RecentScreenshotsArgs extends Record<string, unknown> {
  limit?: number;
  application?: string;
}

const recentScreenshotsArgsSchema = objectSchema<RecentScreenshotsArgs>({
  description: "List stored screenshots, newest first.",
  properties: {
    limit: optionalSchema(integerSchema({ minimum: 1, maximum: 100, default: DEFAULT_SCREENSHOT_LIMIT })),
    application: optionalSchema(stringSchema({ description: "Only screenshots of this executable.", minLength: 1 })),
  },
});

const screenshotStatsArgsSchema = objectSchema<Record<string, never>>({
  description: "Aggregate numbers about the screenshot archive.",
  properties: {},
});

export const screenshotsModule = defineToolModule({
  domain: "screenshots",
  summary: "Read-only access to the encrypted screenshot archive.",
  defaultTags: ["screenshots"],
  tools: [
    {
      name: "screenshots_recent",
      description: "List recent screenshot records (metadata only, no image data).",
      inputSchema: recentScreenshotsArgsSchema.jsonSchema,
      async execute(args: unknown, ctx: ToolExecutionContext) {
        try {
          const parsed = recentScreenshotsArgsSchema.parse(args ?? {});
          const screenshots = ctx.services.screenshots.getScreenshots({
            limit: parsed.limit ?? DEFAULT_SCREENSHOT_LIMIT,
            application: parsed.application,
          });
          return jsonResult({ screenshots }, { success: true, count: screenshots.length });
        } catch (error) {
          return errorResult(error);
        }
      },
    },
    {
      name: "screenshot_stats",
      description: "Total screenshots, captures per application and the covered date range.",
      inputSchema: screenshotStatsArgsSchema.jsonSchema,
      async execute(args: unknown, ctx: ToolExecutionContext) {
        try {
          screenshotStatsArgsSchema.parse(args ?? {});
          return jsonResult({ stats: ctx.services.screenshots.getStats() }, { success: true });
        } catch (error) {
          return errorResult(error);
        }
      },
    },
  ],
});

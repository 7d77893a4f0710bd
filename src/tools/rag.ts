import { CONTENT_TYPES, isContentType, type KnowledgeHit } from "../rag/types.js";
import { DEFAULT_SEARCH_LIMIT } from "../rag/vectorService.js";
import { summarizeQuery } from "../logger.js";
import { defineToolModule, type ToolExecutionContext } from "./types.js";
import { arraySchema, integerSchema, objectSchema, optionalSchema, stringSchema } from "./schema.js";
import { errorResult, jsonResult } from "./responses.js";

interface KnowledgeSearchArgs extends Record<string, unknown> {
  game: string;
  query: string;
  content_types?: readonly string[];
  limit?: number;
}

interface KnowledgeStatsArgs extends Record<string, unknown> {
  game: string;
}

const gameProperty = stringSchema({
  description: "Game identifier as used for its knowledge CSV, e.g. elden_ring.",
  minLength: 1,
  trim: true,
});

const knowledgeSearchArgsSchema = objectSchema<KnowledgeSearchArgs>({
  description: "Semantic search over the stored knowledge of one game.",
  properties: {
    game: gameProperty,
    query: stringSchema({ description: "Free-text question or keywords.", minLength: 1, trim: true }),
    content_types: optionalSchema(
      arraySchema(stringSchema({ enum: CONTENT_TYPES }), {
        description: "Restrict the search to these sources. Defaults to all of them.",
        minItems: 1,
      }),
    ),
    limit: optionalSchema(
      integerSchema({ description: "Maximum number of hits to return.", minimum: 1, maximum: 20, default: DEFAULT_SEARCH_LIMIT }),
    ),
  },
  required: ["game", "query"],
});

const knowledgeStatsArgsSchema = objectSchema<KnowledgeStatsArgs>({
  description: "Chunk counts per content type for one game.",
  properties: { game: gameProperty },
  required: ["game"],
});

function serializeHit(hit: KnowledgeHit) {
  return {
    title: hit.metadata.title,
    url: hit.metadata.url,
    content_type: hit.content_type,
    distance: Number(hit.distance.toFixed(4)),
    content: hit.content,
  };
}

export const ragModule = defineToolModule({
  domain: "knowledge",
  summary: "Search and inspect the per-game knowledge collections.",
  defaultTags: ["knowledge", "rag"],
  tools: [
    {
      name: "knowledge_search",
      description: "Find wiki, video and forum passages relevant to a question about a specific game.",
      inputSchema: knowledgeSearchArgsSchema.jsonSchema,
      tags: ["search"],
      examples: [
        {
          name: "Boss strategy",
          description: "Look up wiki passages about a boss fight",
          arguments: { game: "elden_ring", query: "how to beat margit", content_types: ["wiki"], limit: 3 },
        },
      ],
      async execute(args: unknown, ctx: ToolExecutionContext) {
        try {
          const parsed = knowledgeSearchArgsSchema.parse(args ?? {});
          const types = parsed.content_types ? parsed.content_types.filter(isContentType) : CONTENT_TYPES;
          const limit = parsed.limit ?? DEFAULT_SEARCH_LIMIT;

          ctx.logger.debug("knowledge search", { game: parsed.game, query: summarizeQuery(parsed.query), limit });

          const hits = await ctx.services.search.searchKnowledge(parsed.game, parsed.query, types, limit);
          return jsonResult(
            { game: parsed.game, query: parsed.query, results: hits.map(serializeHit) },
            { success: true, count: hits.length },
          );
        } catch (error) {
          return errorResult(error);
        }
      },
    },
    {
      name: "knowledge_stats",
      description: "Report how many knowledge chunks are stored for a game, per content type.",
      inputSchema: knowledgeStatsArgsSchema.jsonSchema,
      tags: ["stats"],
      async execute(args: unknown, ctx: ToolExecutionContext) {
        try {
          const parsed = knowledgeStatsArgsSchema.parse(args ?? {});
          const stats = await ctx.services.vectors.getGameStats(parsed.game);
          return jsonResult({ game_name: parsed.game, stats }, { success: true });
        } catch (error) {
          return errorResult(error);
        }
      },
    },
  ],
});

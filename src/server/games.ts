import type { FastifyPluginAsync } from "fastify";
import type { AppServices } from "../context.js";
import { AppError, ValidationError } from "../errors.js";
import { CONTENT_TYPES, isContentType } from "../rag/types.js";
import { DEFAULT_SEARCH_LIMIT } from "../rag/vectorService.js";
import { arraySchema, integerSchema, objectSchema, optionalSchema, stringSchema } from "../tools/schema.js";

interface DetectBody extends Record<string, unknown> {
  message?: string;
}

interface SearchBody extends Record<string, unknown> {
  query: string;
  content_types?: readonly string[];
  limit?: number;
}

interface GameParams extends Record<string, unknown> {
  game: string;
}

const detectBodySchema = objectSchema<DetectBody>({
  properties: { message: optionalSchema(stringSchema()) },
});

const searchBodySchema = objectSchema<SearchBody>({
  properties: {
    query: stringSchema({ minLength: 1, trim: true }),
    content_types: optionalSchema(arraySchema(stringSchema({ enum: CONTENT_TYPES }))),
    limit: optionalSchema(integerSchema({ minimum: 1, maximum: 50, default: DEFAULT_SEARCH_LIMIT })),
  },
  required: ["query"],
});

const gameParamsSchema = objectSchema<GameParams>({
  properties: { game: stringSchema({ pattern: /^[\w-]+$/ }) },
  required: ["game"],
});

type GameServices = Pick<AppServices, "detector" | "knowledge" | "vectors" | "search">;

export function gameRoutes(services: GameServices): FastifyPluginAsync {
  return async (app) => {
    app.post("/detect", async (request) => {
      const { message } = detectBodySchema.parse(request.body ?? {});
      const game = await services.detector.detectCurrentGame(message);
      return {
        status: "ok",
        detected_game: game,
        message: game ? `Detected game: ${game}` : "No game detected",
      };
    });

    app.get("/list", async () => ({
      status: "ok",
      detection_games: services.detector.getAvailableGames(),
      csv_games: await services.knowledge.getAvailableGames(),
      vector_games: await services.vectors.listAvailableGames(),
    }));

    app.post("/:game/knowledge/process", async (request) => {
      const { game } = gameParamsSchema.parse(request.params);
      const validation = await services.knowledge.validateCsvStructure(game);
      if (!validation.valid) {
        throw new ValidationError(`Invalid CSV structure: ${validation.errors.join("; ")}`, {
          details: { errors: validation.errors },
        });
      }
      if (!(await services.vectors.addGameKnowledge(game))) {
        throw new AppError("Failed to process game knowledge", "unknown");
      }
      return {
        status: "ok",
        message: `Successfully processed knowledge for ${game}`,
        stats: await services.vectors.getGameStats(game),
      };
    });

    app.post("/:game/knowledge/search", async (request) => {
      const { game } = gameParamsSchema.parse(request.params);
      const body = searchBodySchema.parse(request.body);
      const types = body.content_types ? body.content_types.filter(isContentType) : CONTENT_TYPES;
      const results = await services.search.searchKnowledge(game, body.query, types, body.limit ?? DEFAULT_SEARCH_LIMIT);
      return {
        status: "ok",
        game_name: game,
        query: body.query,
        results,
        total_results: results.length,
      };
    });

    app.get("/:game/knowledge/stats", async (request) => {
      const { game } = gameParamsSchema.parse(request.params);
      return { status: "ok", game_name: game, stats: await services.vectors.getGameStats(game) };
    });

    app.get("/:game/knowledge/validate", async (request) => {
      const { game } = gameParamsSchema.parse(request.params);
      const validation = await services.knowledge.validateCsvStructure(game);
      return { status: "ok", game_name: game, is_valid: validation.valid, errors: validation.errors };
    });

    app.delete("/:game/knowledge", async (request) => {
      const { game } = gameParamsSchema.parse(request.params);
      if (!(await services.vectors.deleteGameKnowledge(game))) {
        throw new AppError("Failed to delete game knowledge", "unknown");
      }
      return { status: "ok", message: `Deleted knowledge for ${game}` };
    });
  };
}

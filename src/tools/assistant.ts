import { defineToolModule, type ToolExecutionContext } from "./types.js";
import { objectSchema, optionalSchema, stringSchema } from "./schema.js";
import { errorResult, jsonResult, textResult } from "./responses.js";

interface GameChatArgs extends Record<string, unknown> {
  message: string;
}

interface DetectGameArgs extends Record<string, unknown> {
  message?: string;
}

const gameChatArgsSchema = objectSchema<GameChatArgs>({
  description: "Ask the gaming assistant a question.",
  properties: {
    message: stringSchema({ description: "The player's question.", minLength: 1, trim: true }),
  },
  required: ["message"],
});

const detectGameArgsSchema = objectSchema<DetectGameArgs>({
  description: "Work out which game is being played.",
  properties: {
    message: optionalSchema(stringSchema({ description: "Optional text that may name the game." })),
  },
});

export const assistantModule = defineToolModule({
  domain: "assistant",
  summary: "Chat with the gaming assistant and detect the active game.",
  defaultTags: ["assistant"],
  tools: [
    {
      name: "game_chat",
      description: "Answer a gaming question, grounded in stored knowledge for the detected game.",
      inputSchema: gameChatArgsSchema.jsonSchema,
      tags: ["chat", "llm"],
      examples: [
        {
          name: "Build advice",
          description: "Ask for a build recommendation",
          arguments: { message: "What is a good starting build in Elden Ring?" },
        },
      ],
      async execute(args: unknown, ctx: ToolExecutionContext) {
        try {
          const parsed = gameChatArgsSchema.parse(args ?? {});
          const reply = await ctx.services.chat.chat(parsed.message);
          return textResult(reply.response, { success: true });
        } catch (error) {
          return errorResult(error);
        }
      },
    },
    {
      name: "detect_game",
      description: "Detect the current game from a message, running processes or recent screenshots.",
      inputSchema: detectGameArgsSchema.jsonSchema,
      tags: ["detection"],
      async execute(args: unknown, ctx: ToolExecutionContext) {
        try {
          const parsed = detectGameArgsSchema.parse(args ?? {});
          const game = await ctx.services.detector.detectCurrentGame(parsed.message);
          return jsonResult(
            { detected_game: game, message: game ? `Detected game: ${game}` : "No game detected" },
            { success: true },
          );
        } catch (error) {
          return errorResult(error);
        }
      },
    },
  ],
});

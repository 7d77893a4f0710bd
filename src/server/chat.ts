import type { FastifyPluginAsync } from "fastify";
import type { AppServices } from "../context.js";
import { objectSchema, optionalSchema, stringSchema } from "../tools/schema.js";

interface ChatBody extends Record<string, unknown> {
  message: string;
  image_data?: string;
}

export const chatBodySchema = objectSchema<ChatBody>({
  properties: {
    message: stringSchema({ description: "The player's question." }),
    image_data: optionalSchema(stringSchema({ description: "Base64 PNG, optionally as a data URL." })),
  },
  required: ["message"],
});

export function chatRoutes(services: Pick<AppServices, "chat">): FastifyPluginAsync {
  return async (app) => {
    app.post("/chat", async (request) => {
      const body = chatBodySchema.parse(request.body);
      return services.chat.chat(body.message, body.image_data);
    });
  };
}

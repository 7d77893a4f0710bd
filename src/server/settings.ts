import type { FastifyPluginAsync } from "fastify";
import type { AppServices } from "../context.js";
import { objectSchema, stringSchema } from "../tools/schema.js";

interface ApiKeyBody extends Record<string, unknown> {
  api_key: string;
}

const apiKeyBodySchema = objectSchema<ApiKeyBody>({
  properties: { api_key: stringSchema() },
  required: ["api_key"],
});

export function settingsRoutes(services: Pick<AppServices, "settings">): FastifyPluginAsync {
  return async (app) => {
    app.get("/api-key", async () => ({ status: "ok", ...services.settings.apiKeyStatus() }));

    app.post("/api-key", async (request) => {
      const { api_key: apiKey } = apiKeyBodySchema.parse(request.body);
      await services.settings.updateApiKey(apiKey);
      return { status: "ok", message: "API key updated" };
    });
  };
}

import type { FastifyPluginAsync } from "fastify";
import type { AppServices } from "../context.js";
import { NotFoundError } from "../errors.js";
import { DEFAULT_CAPTURE_INTERVAL_SEC } from "../screenshots/captureService.js";
import { DEFAULT_SCREENSHOT_LIMIT } from "../screenshots/screenshotStore.js";
import { integerSchema, objectSchema, optionalSchema, stringSchema } from "../tools/schema.js";

interface StartQuery extends Record<string, unknown> {
  interval?: number;
}

interface RecentQuery extends Record<string, unknown> {
  limit?: number;
  application?: string;
  start_date?: string;
  end_date?: string;
}

interface IdParams extends Record<string, unknown> {
  id: number;
}

const startQuerySchema = objectSchema<StartQuery>({
  properties: {
    interval: optionalSchema(integerSchema({ minimum: 1, coerce: true, default: DEFAULT_CAPTURE_INTERVAL_SEC })),
  },
});

const recentQuerySchema = objectSchema<RecentQuery>({
  properties: {
    limit: optionalSchema(integerSchema({ minimum: 1, maximum: 1000, coerce: true, default: DEFAULT_SCREENSHOT_LIMIT })),
    application: optionalSchema(stringSchema({ minLength: 1 })),
    start_date: optionalSchema(stringSchema({ minLength: 1 })),
    end_date: optionalSchema(stringSchema({ minLength: 1 })),
  },
});

const idParamsSchema = objectSchema<IdParams>({
  properties: { id: integerSchema({ minimum: 1, coerce: true }) },
  required: ["id"],
});

export function screenshotRoutes(services: Pick<AppServices, "capture" | "screenshots">): FastifyPluginAsync {
  return async (app) => {
    app.post("/start", async (request) => {
      const { interval = DEFAULT_CAPTURE_INTERVAL_SEC } = startQuerySchema.parse(request.query);
      services.capture.start(interval);
      return { status: "ok", message: `Screenshot capture started with ${interval}s interval` };
    });

    app.post("/stop", async () => {
      services.capture.stop();
      return { status: "ok", message: "Screenshot capture stopped" };
    });

    app.get("/recent", async (request) => {
      const query = recentQuerySchema.parse(request.query);
      const screenshots = services.screenshots.getScreenshots({
        limit: query.limit,
        application: query.application,
        startDate: query.start_date,
        endDate: query.end_date,
      });
      return { status: "ok", screenshots };
    });

    app.get("/stats", async () => ({ status: "ok", stats: services.screenshots.getStats() }));

    app.get("/:id", async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      const data = services.screenshots.getScreenshotData(id);
      if (!data) {
        throw new NotFoundError("Screenshot not found");
      }
      return { status: "ok", data: data.toString("base64") };
    });

    app.delete("/:id", async (request) => {
      const { id } = idParamsSchema.parse(request.params);
      if (!services.screenshots.deleteScreenshot(id)) {
        throw new NotFoundError("Screenshot not found");
      }
      return { status: "ok", message: `Deleted screenshot ${id}` };
    });
  };
}

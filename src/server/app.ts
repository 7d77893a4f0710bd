import fastify, { type FastifyError, type FastifyInstance, type FastifyRequest } from "fastify";
import type { AppServices } from "../context.js";
import { AppError, describeError, httpStatusFor } from "../errors.js";
import { formatErrorMessage, loggerFor } from "../logger.js";
import { chatRoutes } from "./chat.js";
import { gameRoutes } from "./games.js";
import { screenshotRoutes } from "./screenshots.js";
import { settingsRoutes } from "./settings.js";

const log = loggerFor("api");

function statusForError(error: FastifyError | Error): number {
  if (error instanceof AppError) {
    return httpStatusFor(error);
  }
  if ("validation" in error && error.validation) {
    return 400;
  }
  // Fastify's own client errors (bad JSON, oversized body, ...)
  if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode >= 400 && error.statusCode < 500) {
    return error.statusCode;
  }
  return 500;
}

export async function createApp(services: AppServices): Promise<FastifyInstance> {
  const app = fastify({ logger: false, bodyLimit: 25 * 1024 * 1024 });
  const startedAt = new WeakMap<FastifyRequest, number>();

  app.addHook("onRequest", async (request) => {
    startedAt.set(request, Date.now());
  });

  app.addHook("onResponse", async (request, reply) => {
    const latency = Date.now() - (startedAt.get(request) ?? Date.now());
    log.info(`${request.method} ${request.url} status=${reply.statusCode} latencyMs=${latency}`);
  });

  app.setErrorHandler((error, request, reply) => {
    const status = statusForError(error);
    if (status >= 500) {
      log.error(`${request.method} ${request.url} failed error=${formatErrorMessage(error)}`);
    }
    void reply.status(status).send({ detail: describeError(error) });
  });

  app.setNotFoundHandler((request, reply) => {
    void reply.status(404).send({ detail: "Not Found" });
  });

  app.get("/health", async () => ({ status: "ok" }));

  await app.register(chatRoutes(services));
  await app.register(screenshotRoutes(services), { prefix: "/screenshots" });
  await app.register(gameRoutes(services), { prefix: "/games" });
  await app.register(settingsRoutes(services), { prefix: "/settings" });

  return app;
}

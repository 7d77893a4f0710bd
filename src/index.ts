#!/usr/bin/env node
/**
 * CLI entry point.
 *
 *   game-sage [serve]        HTTP API for the overlay (default)
 *   game-sage mcp            Model Context Protocol server on stdio
 *   game-sage ingest <game>  build the knowledge collections for one game
 */
import { redirectConsoleToStderr } from "./bootstrap/stdio-logger.js";
import { loadConfig } from "./config.js";
import { createServices, type AppServices } from "./context.js";
import { parseCliArgs } from "./cli.js";
import { formatErrorMessage, loggerFor } from "./logger.js";

const log = loggerFor("main");

async function serve(services: AppServices): Promise<void> {
  const { createApp } = await import("./server/app.js");
  const app = await createApp(services);
  const shutdown = () => {
    app
      .close()
      .then(() => services.close())
      .catch((error: unknown) => log.error(`shutdown failed error=${formatErrorMessage(error)}`));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  const address = await app.listen({ host: services.config.host, port: services.config.port });
  log.info(`listening address=${address}`);
}

async function ingest(services: AppServices, game: string): Promise<void> {
  try {
    const validation = await services.knowledge.validateCsvStructure(game);
    if (!validation.valid) {
      throw new Error(`Invalid CSV structure for ${game}: ${validation.errors.join("; ")}`);
    }
    if (!(await services.vectors.addGameKnowledge(game))) {
      throw new Error(`Failed to process knowledge for ${game}`);
    }
    const stats = await services.vectors.getGameStats(game);
    console.log(`Processed ${game}: wiki=${stats.wiki} youtube=${stats.youtube} forum=${stats.forum}`);
  } finally {
    services.close();
  }
}

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.mode === "mcp") {
    redirectConsoleToStderr();
  }

  const services = await createServices(loadConfig());

  switch (command.mode) {
    case "serve":
      await serve(services);
      break;
    case "mcp": {
      const { runMcpServer } = await import("./mcp-server.js");
      await runMcpServer(services);
      break;
    }
    case "ingest":
      await ingest(services, command.game);
      break;
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal: ${formatErrorMessage(error)}`);
  process.exit(1);
});

export type CliCommand = { mode: "serve" } | { mode: "mcp" } | { mode: "ingest"; game: string };

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [mode = "serve", ...rest] = argv;
  switch (mode) {
    case "serve":
      return { mode: "serve" };
    case "mcp":
      return { mode: "mcp" };
    case "ingest": {
      const game = rest[0]?.trim();
      if (!game) {
        throw new Error("Usage: game-sage ingest <game>");
      }
      return { mode: "ingest", game };
    }
    default:
      throw new Error(`Unknown command: ${mode}. Expected serve, mcp or ingest <game>`);
  }
}

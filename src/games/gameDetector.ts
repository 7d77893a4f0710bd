import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import type { ScreenshotHistory, ScreenshotSummary } from "../screenshots/types.js";
import type { GameCatalog, GameMapping } from "./catalog.js";
import type { ProcessLister } from "./processList.js";

export const DETECTION_CACHE_MS = 30_000;
const SCREENSHOT_LOOKBACK = 5;

export interface GameDetectorOptions {
  catalog: GameCatalog;
  processes: ProcessLister;
  screenshots: ScreenshotHistory;
  now?: () => number;
  cacheMs?: number;
  logger?: PrefixedLogger;
}

interface CachedDetection {
  game: string | null;
  at: number;
}

/**
 * Works out which game the user is playing. An explicit mention in the
 * message wins, then a recent cached hit, then running executables, then the
 * windows seen in recent screenshots.
 */
export class GameDetector {
  private readonly mappings: GameCatalog;
  private readonly processes: ProcessLister;
  private readonly screenshots: ScreenshotHistory;
  private readonly now: () => number;
  private readonly cacheMs: number;
  private readonly log: PrefixedLogger;
  private cache: CachedDetection = { game: null, at: 0 };

  constructor(options: GameDetectorOptions) {
    this.mappings = new Map(options.catalog);
    this.processes = options.processes;
    this.screenshots = options.screenshots;
    this.now = options.now ?? Date.now;
    this.cacheMs = options.cacheMs ?? DETECTION_CACHE_MS;
    this.log = options.logger ?? loggerFor("games");
  }

  detectFromMessage(message: string): string | null {
    const lowered = message.toLowerCase();
    for (const [game, mapping] of this.mappings) {
      if (mapping.keywords.some((keyword) => containsWord(lowered, keyword))) {
        return game;
      }
    }
    return null;
  }

  async detectFromProcesses(): Promise<string | null> {
    let running: Set<string>;
    try {
      running = new Set(await this.processes.listProcessNames());
    } catch (error) {
      this.log.warn(`process scan failed error=${formatErrorMessage(error)}`);
      return null;
    }
    for (const [game, mapping] of this.mappings) {
      if (mapping.processes.some((name) => running.has(name.toLowerCase()))) {
        return game;
      }
    }
    return null;
  }

  detectFromScreenshots(): string | null {
    let recent: ScreenshotSummary[];
    try {
      recent = this.screenshots.getScreenshots({ limit: SCREENSHOT_LOOKBACK });
    } catch (error) {
      this.log.warn(`screenshot scan failed error=${formatErrorMessage(error)}`);
      return null;
    }
    for (const shot of recent) {
      const application = shot.application.toLowerCase();
      const title = (shot.window_title ?? "").toLowerCase();
      for (const [game, mapping] of this.mappings) {
        const keywordHit = mapping.keywords.some(
          (keyword) => containsWord(application, keyword) || containsWord(title, keyword),
        );
        const titleHit = title.length > 0 && mapping.windowTitles.some((entry) => title.includes(entry));
        if (keywordHit || titleHit) {
          return game;
        }
      }
    }
    return null;
  }

  async detectCurrentGame(message?: string): Promise<string | null> {
    const now = this.now();

    if (message) {
      const mentioned = this.detectFromMessage(message);
      if (mentioned) {
        return this.remember(mentioned, now, "message");
      }
    }

    if (this.cache.game && now - this.cache.at < this.cacheMs) {
      return this.cache.game;
    }

    const fromProcesses = await this.detectFromProcesses();
    if (fromProcesses) {
      return this.remember(fromProcesses, now, "process");
    }

    const fromScreenshots = this.detectFromScreenshots();
    if (fromScreenshots) {
      return this.remember(fromScreenshots, now, "screenshot");
    }

    this.cache = { game: null, at: now };
    return null;
  }

  addGameMapping(game: string, processes: readonly string[], keywords: readonly string[], windowTitles: readonly string[] = []): void {
    const normalise = (values: readonly string[]) => values.map((value) => value.trim().toLowerCase()).filter(Boolean);
    const mapping: GameMapping = {
      processes: normalise(processes),
      keywords: normalise(keywords),
      windowTitles: normalise(windowTitles),
    };
    this.mappings.set(game, mapping);
    this.log.info(`mapping added game=${game} processes=${mapping.processes.length} keywords=${mapping.keywords.length}`);
  }

  getAvailableGames(): string[] {
    return [...this.mappings.keys()];
  }

  clearCache(): void {
    this.cache = { game: null, at: 0 };
  }

  private remember(game: string, at: number, source: string): string {
    if (this.cache.game !== game) {
      this.log.info(`detected game=${game} source=${source}`);
    }
    this.cache = { game, at };
    return game;
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** True when `needle` appears in `haystack` without letters or digits glued to either side. */
export function containsWord(haystack: string, needle: string): boolean {
  if (!needle) return false;
  const pattern = new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(needle.toLowerCase())}(?![\\p{L}\\p{N}])`, "u");
  return pattern.test(haystack);
}

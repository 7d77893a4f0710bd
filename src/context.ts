/*
Game Sage - Service Wiring
GPL-2.0-only
*/

import { ChatService } from "./chat/chatService.js";
import { GeminiChatModel, type ChatModel } from "./chat/llmClient.js";
import { loadSystemPrompt } from "./chat/promptBuilder.js";
import type { GameSageConfig } from "./config.js";
import { loadGameCatalog } from "./games/catalog.js";
import { GameDetector } from "./games/gameDetector.js";
import { SystemProcessLister, type ProcessLister } from "./games/processList.js";
import { createLoggingHttpClient } from "./httpClient.js";
import { UnavailableError } from "./errors.js";
import { loggerFor } from "./logger.js";
import { GeminiEmbedding, LocalHashEmbedding, type EmbeddingModel } from "./rag/embeddings.js";
import { KnowledgeManager } from "./rag/knowledgeManager.js";
import { LoggingKnowledgeSearch } from "./rag/loggingSearch.js";
import { HttpPageFetcher, type PageFetcher } from "./rag/pageFetcher.js";
import type { KnowledgeSearch } from "./rag/types.js";
import { VectorService } from "./rag/vectorService.js";
import { VectorStore } from "./rag/vectorStore.js";
import { DesktopScreenGrabber, SystemWindowProbe, type ScreenGrabber, type WindowProbe } from "./screenshots/capture.js";
import { CaptureService } from "./screenshots/captureService.js";
import { Fernet } from "./screenshots/fernet.js";
import { loadOrCreateKey } from "./screenshots/keyStore.js";
import { ScreenshotStore } from "./screenshots/screenshotStore.js";
import { SettingsService } from "./settings/settingsService.js";

export interface AppServices {
  readonly config: GameSageConfig;
  readonly model: ChatModel;
  readonly chat: ChatService;
  readonly knowledge: KnowledgeManager;
  readonly vectors: VectorService;
  /** Search with per-query logging; routes and tools go through this one. */
  readonly search: KnowledgeSearch;
  readonly detector: GameDetector;
  readonly screenshots: ScreenshotStore;
  readonly capture: CaptureService;
  readonly settings: SettingsService;
  close(): void;
}

/** Seams replaced by in-process fakes in tests. */
export interface ServiceOverrides {
  model?: ChatModel;
  embedding?: EmbeddingModel;
  fetcher?: PageFetcher;
  processes?: ProcessLister;
  grabber?: ScreenGrabber;
  probe?: WindowProbe;
  systemPrompt?: string;
}

function createEmbedding(config: GameSageConfig): EmbeddingModel {
  if (config.embedding === "gemini") {
    if (!config.googleApiKey) {
      throw new UnavailableError("Gemini embeddings need GOOGLE_API_KEY to be set");
    }
    return new GeminiEmbedding({ apiKey: config.googleApiKey });
  }
  return new LocalHashEmbedding();
}

export async function createServices(config: GameSageConfig, overrides: ServiceOverrides = {}): Promise<AppServices> {
  const systemPrompt = overrides.systemPrompt ?? (await loadSystemPrompt(config.systemPromptPath));
  if (!systemPrompt) {
    loggerFor("chat").warn(`system prompt missing path=${config.systemPromptPath}`);
  }

  const model =
    overrides.model ??
    new GeminiChatModel({ apiKey: config.googleApiKey, model: config.chatModel, systemInstruction: systemPrompt });

  const fetcher =
    overrides.fetcher ??
    new HttpPageFetcher(createLoggingHttpClient({ timeout: config.fetchTimeoutMs }), {
      rps: config.fetchRps,
      timeoutMs: config.fetchTimeoutMs,
    });
  const knowledge = new KnowledgeManager({ gamesInfoDir: config.gamesInfoDir, fetcher });

  const embedding = overrides.embedding ?? createEmbedding(config);
  const store = new VectorStore({ directory: config.vectorDbDir, dim: embedding.dim, model: embedding.name });
  const vectors = new VectorService({ store, embedding, source: knowledge });
  const search = new LoggingKnowledgeSearch(vectors);

  const cipher = new Fernet(loadOrCreateKey(config.screenshotKeyPath));
  const screenshots = await ScreenshotStore.open({ dbPath: config.screenshotDbPath, cipher });
  const capture = new CaptureService({
    store: screenshots,
    grabber: overrides.grabber ?? new DesktopScreenGrabber(),
    probe: overrides.probe ?? new SystemWindowProbe(),
    intervalSec: config.screenshotIntervalSec,
  });

  const detector = new GameDetector({
    catalog: loadGameCatalog(config.catalogPath),
    processes: overrides.processes ?? new SystemProcessLister(),
    screenshots,
  });

  const chat = new ChatService({ model, detector, knowledge: search, screenshots });
  const settings = new SettingsService({ envFilePath: config.envFilePath, model, apiKey: config.googleApiKey });

  return {
    config,
    model,
    chat,
    knowledge,
    vectors,
    search,
    detector,
    screenshots,
    capture,
    settings,
    close() {
      capture.stop();
      screenshots.close();
    },
  };
}

import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import type { KnowledgeSearch } from "../rag/types.js";
import type { ScreenshotHistory } from "../screenshots/types.js";
import type { ChatModel, ChatPart } from "./llmClient.js";
import { buildImagePrompt, buildKnowledgePrompt, buildScreenshotPrompt, mentionsScreenshots } from "./promptBuilder.js";

export const CHAT_KNOWLEDGE_LIMIT = 3;
const RECENT_SCREENSHOTS = 5;

export interface ChatReply {
  response: string;
}

export interface GameResolver {
  detectCurrentGame(message?: string): Promise<string | null>;
}

export interface ChatServiceOptions {
  model: ChatModel;
  detector: GameResolver;
  knowledge: KnowledgeSearch;
  screenshots: ScreenshotHistory;
  logger?: PrefixedLogger;
}

export class ChatService {
  private readonly model: ChatModel;
  private readonly detector: GameResolver;
  private readonly knowledge: KnowledgeSearch;
  private readonly screenshots: ScreenshotHistory;
  private readonly log: PrefixedLogger;

  constructor(options: ChatServiceOptions) {
    this.model = options.model;
    this.detector = options.detector;
    this.knowledge = options.knowledge;
    this.screenshots = options.screenshots;
    this.log = options.logger ?? loggerFor("chat");
  }

  /** Never rejects: failures become an error reply the overlay can show as-is. */
  async chat(message: string, imageData?: string): Promise<ChatReply> {
    try {
      const parts = await this.buildParts(message, imageData);
      return { response: await this.model.generate(parts) };
    } catch (error) {
      const reason = formatErrorMessage(error);
      this.log.error(`chat failed error=${reason}`);
      return { response: `Error processing request: ${reason}` };
    }
  }

  private async buildParts(message: string, imageData?: string): Promise<ChatPart[]> {
    const game = await this.detector.detectCurrentGame(message);

    if (imageData) {
      return [{ text: buildImagePrompt(message, game) }, { inlineData: { mimeType: "image/png", data: stripDataUrl(imageData) } }];
    }

    if (mentionsScreenshots(message)) {
      const recent = this.screenshots.getScreenshots({ limit: RECENT_SCREENSHOTS });
      const stats = this.screenshots.getStats();
      return [{ text: buildScreenshotPrompt(message, stats, recent) }];
    }

    if (!game) {
      return [{ text: buildKnowledgePrompt(message, null, []) }];
    }

    let hits: Awaited<ReturnType<KnowledgeSearch["searchKnowledge"]>> = [];
    try {
      hits = await this.knowledge.searchKnowledge(game, message, undefined, CHAT_KNOWLEDGE_LIMIT);
    } catch (error) {
      this.log.warn(`knowledge lookup failed game=${game} error=${formatErrorMessage(error)}`);
    }
    return [{ text: buildKnowledgePrompt(message, game, hits) }];
  }
}

/** Accepts bare base64 or a `data:image/...;base64,` URL. */
export function stripDataUrl(imageData: string): string {
  const comma = imageData.indexOf(",");
  return imageData.startsWith("data:") && comma >= 0 ? imageData.slice(comma + 1) : imageData.trim();
}

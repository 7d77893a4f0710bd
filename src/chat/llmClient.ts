import { GoogleGenAI } from "@google/genai";
import { UnavailableError, UpstreamError } from "../errors.js";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";

export interface TextPart {
  text: string;
}

export interface InlineImagePart {
  inlineData: { mimeType: string; data: string };
}

export type ChatPart = TextPart | InlineImagePart;

export interface ChatModel {
  generate(parts: readonly ChatPart[]): Promise<string>;
  /** Swaps credentials at runtime; false when the key is empty. */
  setApiKey(apiKey: string): boolean;
  isConfigured(): boolean;
}

export interface GeminiChatModelOptions {
  apiKey?: string;
  model: string;
  systemInstruction: string;
  logger?: PrefixedLogger;
}

export class GeminiChatModel implements ChatModel {
  private readonly model: string;
  private readonly systemInstruction: string;
  private readonly log: PrefixedLogger;
  private client: GoogleGenAI | null = null;

  constructor(options: GeminiChatModelOptions) {
    this.model = options.model;
    this.systemInstruction = options.systemInstruction;
    this.log = options.logger ?? loggerFor("llm");
    if (options.apiKey) {
      this.setApiKey(options.apiKey);
    }
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  setApiKey(apiKey: string): boolean {
    const trimmed = apiKey.trim();
    if (!trimmed) {
      return false;
    }
    this.client = new GoogleGenAI({ apiKey: trimmed });
    return true;
  }

  async generate(parts: readonly ChatPart[]): Promise<string> {
    if (!this.client) {
      throw new UnavailableError("Google API key is not configured");
    }

    const startedAt = Date.now();
    const imageCount = parts.filter((part) => "inlineData" in part).length;
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: [{ role: "user", parts: [...parts] }],
        config: this.systemInstruction ? { systemInstruction: this.systemInstruction } : undefined,
      });
      const text = response.text ?? response.candidates?.[0]?.content?.parts?.[0]?.text ?? "";
      this.log.info(
        `generate model=${this.model} images=${imageCount} status=ok chars=${text.length} latencyMs=${Date.now() - startedAt}`,
      );
      return text;
    } catch (error) {
      this.log.warn(
        `generate model=${this.model} images=${imageCount} status=error latencyMs=${Date.now() - startedAt} error=${formatErrorMessage(error)}`,
      );
      throw new UpstreamError(formatErrorMessage(error), { cause: error });
    }
  }
}

import type { AxiosInstance } from "axios";
import { UpstreamError } from "../errors.js";
import { loggerFor, type PrefixedLogger } from "../logger.js";
import { AdaptiveRateLimiter, RealTimeSource, type TimeSource } from "./rateLimiter.js";
import { rateLimitKeyFor } from "./urlUtils.js";

export interface PageFetcher {
  /** Resolves with the response body of a 2xx answer; rejects otherwise. */
  fetchHtml(url: string): Promise<string>;
}

export interface HttpPageFetcherOptions {
  rps?: number;
  timeoutMs?: number;
  maxRetries?: number;
  timeSource?: TimeSource;
  logger?: PrefixedLogger;
}

interface RawResponse {
  status: number;
  body: string;
}

/** Fetches pages one registered domain at a time, backing off on 429 and 5xx. */
export class HttpPageFetcher implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly limiter: AdaptiveRateLimiter;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly timeSource: TimeSource;
  private readonly log: PrefixedLogger;

  constructor(http: AxiosInstance, options: HttpPageFetcherOptions = {}) {
    this.http = http;
    this.timeSource = options.timeSource ?? new RealTimeSource();
    this.limiter = new AdaptiveRateLimiter(options.rps ?? 1, this.timeSource);
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.maxRetries = options.maxRetries ?? 2;
    this.log = options.logger ?? loggerFor("fetch");
  }

  async fetchHtml(url: string): Promise<string> {
    const key = rateLimitKeyFor(url);
    const response = await this.withRetries(url, key);
    if (response.status < 200 || response.status >= 300) {
      throw new UpstreamError(`GET ${url} failed with status ${response.status}`, {
        details: { url, status: response.status },
      });
    }
    return response.body;
  }

  private async withRetries(url: string, key: string): Promise<RawResponse> {
    let attempt = 0;
    let delay = 250;
    for (;;) {
      await this.limiter.consume(key);
      try {
        const response = await this.request(url);
        const retryable = response.status === 429 || response.status >= 500;
        if (retryable) {
          this.limiter.notifyThrottle(key);
        }
        if (!retryable || attempt >= this.maxRetries) {
          return response;
        }
        this.log.debug(`retry url=${url} status=${response.status} attempt=${attempt + 1}`);
      } catch (error) {
        if (attempt >= this.maxRetries) throw error;
        this.log.debug(`retry url=${url} status=ERR attempt=${attempt + 1}`);
      }
      await this.timeSource.sleepMs(delay);
      attempt++;
      delay = Math.min(delay * 2, 4_000);
    }
  }

  private async request(url: string): Promise<RawResponse> {
    const response = await this.http.get<string>(url, {
      timeout: this.timeoutMs,
      responseType: "text",
      // Status handling happens in withRetries.
      validateStatus: () => true,
    });
    const body = typeof response.data === "string" ? response.data : String(response.data ?? "");
    return { status: response.status, body };
  }
}

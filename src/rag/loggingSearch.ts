import { formatErrorMessage, formatPayloadForDebug, loggerFor, summarizeQuery, type PrefixedLogger } from "../logger.js";
import type { ContentType, KnowledgeHit, KnowledgeSearch } from "./types.js";

export class LoggingKnowledgeSearch implements KnowledgeSearch {
  private readonly inner: KnowledgeSearch;
  private readonly log: PrefixedLogger;

  constructor(inner: KnowledgeSearch, logger: PrefixedLogger = loggerFor("rag")) {
    this.inner = inner;
    this.log = logger;
  }

  async searchKnowledge(
    game: string,
    query: string,
    contentTypes?: readonly ContentType[],
    limit?: number,
  ): Promise<KnowledgeHit[]> {
    const startedAt = Date.now();
    const keywords = summarizeQuery(query);

    if (this.log.isDebugEnabled()) {
      this.log.debug("search request", { game, query, contentTypes, limit });
    }

    try {
      const hits = await this.inner.searchKnowledge(game, query, contentTypes, limit);
      const latency = Date.now() - startedAt;
      this.log.info(`search game=${game} keywords="${keywords}" hits=${hits.length} latencyMs=${latency}`);

      if (this.log.isDebugEnabled()) {
        this.log.debug("search response", {
          hits: formatPayloadForDebug(hits.map((hit) => ({ url: hit.metadata.url, distance: hit.distance }))),
        });
      }
      return hits;
    } catch (error) {
      const latency = Date.now() - startedAt;
      this.log.error(`search game=${game} keywords="${keywords}" hits=0 latencyMs=${latency} error=${formatErrorMessage(error)}`);
      throw error;
    }
  }
}

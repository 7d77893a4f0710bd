import crypto from "node:crypto";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import { chunkText } from "./chunker.js";
import type { EmbeddingModel, EmbeddingVector } from "./embeddings.js";
import { collectionName, type VectorStore } from "./vectorStore.js";
import {
  CONTENT_TYPES,
  type ChunkMetadata,
  type ContentType,
  type GameStats,
  type KnowledgeHit,
  type KnowledgeSearch,
  type KnowledgeSource,
} from "./types.js";

export const DEFAULT_SEARCH_LIMIT = 5;

export interface VectorServiceOptions {
  store: VectorStore;
  embedding: EmbeddingModel;
  source: KnowledgeSource;
  logger?: PrefixedLogger;
}

interface PreparedChunks {
  ids: string[];
  documents: string[];
  metadatas: ChunkMetadata[];
}

/** Ingestion and retrieval over the per-game collections. */
export class VectorService implements KnowledgeSearch {
  private readonly store: VectorStore;
  private readonly embedding: EmbeddingModel;
  private readonly source: KnowledgeSource;
  private readonly log: PrefixedLogger;

  constructor(options: VectorServiceOptions) {
    this.store = options.store;
    this.embedding = options.embedding;
    this.source = options.source;
    this.log = options.logger ?? loggerFor("vectors");
  }

  /**
   * Rebuilds the game's collections from its CSV. Every chunk is embedded before
   * the stored ones are replaced, so a failed run leaves the previous knowledge intact.
   */
  async addGameKnowledge(game: string): Promise<boolean> {
    try {
      const knowledge = await this.source.processGameKnowledge(game);

      const batches: Array<{ contentType: ContentType; prepared: PreparedChunks; embeddings: EmbeddingVector[] }> = [];
      for (const contentType of CONTENT_TYPES) {
        const prepared = prepareChunks(game, contentType, knowledge[contentType]);
        if (prepared.documents.length === 0) continue;
        batches.push({ contentType, prepared, embeddings: await this.embedding.embedMany(prepared.documents) });
      }

      for (const contentType of CONTENT_TYPES) {
        const existing = await this.store.getCollection(collectionName(game, contentType));
        await existing?.clear();
      }

      for (const { contentType, prepared, embeddings } of batches) {
        const collection = await this.store.getOrCreateCollection(game, contentType);
        await collection.add({ ...prepared, embeddings });
        this.log.info(`ingest game=${game} type=${contentType} chunks=${prepared.documents.length}`);
      }
      return true;
    } catch (error) {
      this.log.error(`ingest game=${game} error=${formatErrorMessage(error)}`);
      return false;
    }
  }

  async searchKnowledge(
    game: string,
    query: string,
    contentTypes: readonly ContentType[] = CONTENT_TYPES,
    limit: number = DEFAULT_SEARCH_LIMIT,
  ): Promise<KnowledgeHit[]> {
    let queryEmbedding: EmbeddingVector;
    try {
      queryEmbedding = await this.embedding.embed(query);
    } catch (error) {
      this.log.warn(`embed query game=${game} error=${formatErrorMessage(error)}`);
      return [];
    }

    const hits: KnowledgeHit[] = [];
    for (const contentType of contentTypes) {
      const collection = await this.store.getCollection(collectionName(game, contentType));
      if (!collection) continue;
      for (const hit of collection.query(queryEmbedding, limit)) {
        hits.push({ content: hit.document, metadata: hit.metadata, distance: hit.distance, content_type: contentType });
      }
    }

    hits.sort((a, b) => a.distance - b.distance);
    return hits.slice(0, limit);
  }

  async getGameStats(game: string): Promise<GameStats> {
    const stats: GameStats = { wiki: 0, youtube: 0, forum: 0 };
    for (const contentType of CONTENT_TYPES) {
      const collection = await this.store.getCollection(collectionName(game, contentType));
      stats[contentType] = collection?.count() ?? 0;
    }
    return stats;
  }

  async deleteGameKnowledge(game: string): Promise<boolean> {
    try {
      for (const contentType of CONTENT_TYPES) {
        await this.store.deleteCollection(collectionName(game, contentType));
      }
      this.log.info(`delete game=${game}`);
      return true;
    } catch (error) {
      this.log.error(`delete game=${game} error=${formatErrorMessage(error)}`);
      return false;
    }
  }

  async listAvailableGames(): Promise<string[]> {
    const collections = await this.store.listCollections();
    const games = new Set(collections.map((collection) => collection.metadata.game));
    return [...games].sort();
  }
}

function prepareChunks(
  game: string,
  contentType: ContentType,
  entries: readonly { url: string; title: string; description: string; content?: string }[],
): PreparedChunks {
  const prepared: PreparedChunks = { ids: [], documents: [], metadatas: [] };

  for (const entry of entries) {
    const chunks = chunkText(entry.content || entry.description);
    const entryKey = crypto.randomBytes(4).toString("hex");

    chunks.forEach((chunk, index) => {
      if (!chunk.trim()) return;
      prepared.ids.push(`${game}_${contentType}_${entryKey}_${index}`);
      prepared.documents.push(chunk);
      prepared.metadatas.push({
        game,
        content_type: contentType,
        url: entry.url,
        title: entry.title,
        description: entry.description,
        chunk_index: index,
        total_chunks: chunks.length,
      });
    });
  }

  return prepared;
}

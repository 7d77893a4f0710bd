/*
Game Sage - File-backed vector collections
GPL-2.0-only
*/

import { mkdirSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { ValidationError, isErrnoException } from "../errors.js";
import { loggerFor, type PrefixedLogger } from "../logger.js";
import { cosineDistance } from "./embeddings.js";
import { isContentType, type ChunkMetadata, type ContentType } from "./types.js";

export interface ChunkRecord {
  id: string;
  document: string;
  embedding: number[];
  metadata: ChunkMetadata;
}

export interface CollectionFile {
  name: string;
  metadata: { game: string; contentType: ContentType };
  dim: number;
  model: string;
  records: ChunkRecord[];
}

export interface CollectionAddInput {
  ids: readonly string[];
  documents: readonly string[];
  metadatas: readonly ChunkMetadata[];
  embeddings: readonly ArrayLike<number>[];
}

export interface CollectionQueryHit {
  id: string;
  document: string;
  metadata: ChunkMetadata;
  distance: number;
}

export function collectionName(game: string, contentType: ContentType): string {
  return `${game}_${contentType}`;
}

export class Collection {
  private readonly file: CollectionFile;
  private readonly persist: (file: CollectionFile) => Promise<void>;

  constructor(file: CollectionFile, persist: (file: CollectionFile) => Promise<void>) {
    this.file = file;
    this.persist = persist;
  }

  get name(): string {
    return this.file.name;
  }

  get metadata(): CollectionFile["metadata"] {
    return this.file.metadata;
  }

  count(): number {
    return this.file.records.length;
  }

  async add(input: CollectionAddInput): Promise<void> {
    const size = input.ids.length;
    if (input.documents.length !== size || input.metadatas.length !== size || input.embeddings.length !== size) {
      throw new ValidationError("ids, documents, metadatas and embeddings must have the same length", {
        details: {
          ids: size,
          documents: input.documents.length,
          metadatas: input.metadatas.length,
          embeddings: input.embeddings.length,
        },
      });
    }
    input.embeddings.forEach((embedding, index) => this.assertDimension(embedding, `$.embeddings[${index}]`));

    const byId = new Map(this.file.records.map((record, index) => [record.id, index]));
    for (let i = 0; i < size; i++) {
      const record: ChunkRecord = {
        id: input.ids[i],
        document: input.documents[i],
        embedding: Array.from(input.embeddings[i]),
        metadata: input.metadatas[i],
      };
      const existing = byId.get(record.id);
      if (existing === undefined) {
        byId.set(record.id, this.file.records.length);
        this.file.records.push(record);
      } else {
        this.file.records[existing] = record;
      }
    }
    await this.persist(this.file);
  }

  /** Nearest records by cosine distance, closest first. */
  query(embedding: ArrayLike<number>, nResults: number): CollectionQueryHit[] {
    this.assertDimension(embedding, "$.embedding");
    return this.file.records
      .map((record) => ({
        id: record.id,
        document: record.document,
        metadata: record.metadata,
        distance: cosineDistance(embedding, record.embedding),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, Math.max(0, nResults));
  }

  async clear(): Promise<void> {
    if (this.file.records.length === 0) return;
    this.file.records = [];
    await this.persist(this.file);
  }

  private assertDimension(embedding: ArrayLike<number>, at: string): void {
    if (embedding.length !== this.file.dim) {
      throw new ValidationError(`Embedding dimension ${embedding.length} does not match collection dimension ${this.file.dim}`, {
        path: at,
      });
    }
  }
}

export interface VectorStoreOptions {
  directory: string;
  dim: number;
  model: string;
  logger?: PrefixedLogger;
}

/** One JSON file per collection under `directory`. */
export class VectorStore {
  private readonly directory: string;
  private readonly dim: number;
  private readonly model: string;
  private readonly log: PrefixedLogger;
  private readonly cache = new Map<string, Collection>();
  // Pending file operation per collection; writes and deletes of one collection run in order.
  private readonly pending = new Map<string, Promise<unknown>>();

  constructor(options: VectorStoreOptions) {
    this.directory = options.directory;
    this.dim = options.dim;
    this.model = options.model;
    this.log = options.logger ?? loggerFor("vectors");
    mkdirSync(this.directory, { recursive: true });
  }

  async getOrCreateCollection(game: string, contentType: ContentType): Promise<Collection> {
    const name = collectionName(game, contentType);
    const existing = await this.getCollection(name);
    if (existing) {
      return existing;
    }
    const collection = this.wrap({ name, metadata: { game, contentType }, dim: this.dim, model: this.model, records: [] });
    this.cache.set(name, collection);
    this.log.info(`create collection name=${name} dim=${this.dim} model=${this.model}`);
    return collection;
  }

  async getCollection(name: string): Promise<Collection | null> {
    const cached = this.cache.get(name);
    if (cached) {
      return cached;
    }
    const file = await this.readCollectionFile(name);
    if (!file) {
      return null;
    }
    if (file.model !== this.model || file.dim !== this.dim) {
      this.log.warn(`collection name=${name} was built with model=${file.model} dim=${file.dim}; ignoring it`);
      return null;
    }
    const collection = this.wrap(file);
    this.cache.set(name, collection);
    return collection;
  }

  async listCollections(): Promise<Collection[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return [];
      throw error;
    }
    const names = new Set([
      ...entries.filter((entry) => entry.endsWith(".json")).map((entry) => entry.slice(0, -".json".length)),
      ...this.cache.keys(),
    ]);
    const collections: Collection[] = [];
    for (const name of [...names].sort()) {
      const collection = await this.getCollection(name);
      if (collection) collections.push(collection);
    }
    return collections;
  }

  async deleteCollection(name: string): Promise<boolean> {
    const wasCached = this.cache.delete(name);
    return this.enqueue(name, async () => {
      try {
        await fs.unlink(this.filePath(name));
        return true;
      } catch (error) {
        if (isErrnoException(error) && error.code === "ENOENT") return wasCached;
        throw error;
      }
    });
  }

  /** Runs `task` after every earlier operation on the same collection has settled. */
  private enqueue<T>(name: string, task: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(name) ?? Promise.resolve();
    // Earlier failures were already delivered to their own callers.
    const next = previous.then(task, task);
    this.pending.set(name, next);
    return next;
  }

  private wrap(file: CollectionFile): Collection {
    return new Collection(file, (current) => this.writeCollectionFile(current));
  }

  private filePath(name: string): string {
    return path.join(this.directory, `${name}.json`);
  }

  private async readCollectionFile(name: string): Promise<CollectionFile | null> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath(name), "utf-8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return null;
      throw error;
    }
    const parsed = parseCollectionFile(JSON.parse(text));
    if (!parsed) {
      this.log.warn(`collection name=${name} has an unexpected layout; ignoring it`);
    }
    return parsed;
  }

  private writeCollectionFile(file: CollectionFile): Promise<void> {
    return this.enqueue(file.name, async () => {
      const target = this.filePath(file.name);
      const temp = `${target}.${process.pid}.tmp`;
      await fs.writeFile(temp, JSON.stringify(file), "utf-8");
      await fs.rename(temp, target);
      this.log.debug(`write collection name=${file.name} records=${file.records.length}`);
    });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseChunkMetadata(value: unknown): ChunkMetadata | null {
  if (!isRecord(value)) return null;
  const { game, content_type, url, title, description, chunk_index, total_chunks } = value;
  if (
    typeof game !== "string" ||
    !isContentType(content_type) ||
    typeof url !== "string" ||
    typeof title !== "string" ||
    typeof description !== "string" ||
    typeof chunk_index !== "number" ||
    typeof total_chunks !== "number"
  ) {
    return null;
  }
  return { game, content_type, url, title, description, chunk_index, total_chunks };
}

function parseChunkRecord(value: unknown): ChunkRecord | null {
  if (!isRecord(value)) return null;
  const { id, document, embedding } = value;
  const metadata = parseChunkMetadata(value.metadata);
  if (typeof id !== "string" || typeof document !== "string" || !metadata || !Array.isArray(embedding)) {
    return null;
  }
  const numbers = embedding.filter((entry): entry is number => typeof entry === "number");
  if (numbers.length !== embedding.length) return null;
  return { id, document, embedding: numbers, metadata };
}

export function parseCollectionFile(value: unknown): CollectionFile | null {
  if (!isRecord(value) || !isRecord(value.metadata) || !Array.isArray(value.records)) return null;
  const { name, dim, model } = value;
  const { game, contentType } = value.metadata;
  if (typeof name !== "string" || typeof dim !== "number" || typeof model !== "string") return null;
  if (typeof game !== "string" || !isContentType(contentType)) return null;
  const records: ChunkRecord[] = [];
  for (const entry of value.records) {
    const record = parseChunkRecord(entry);
    if (!record) return null;
    records.push(record);
  }
  return { name, metadata: { game, contentType }, dim, model, records };
}

/*
Game Sage - Embedding models
GPL-2.0-only
*/

import crypto from "node:crypto";
import { GoogleGenAI } from "@google/genai";
import { UpstreamError } from "../errors.js";

export type EmbeddingVector = Float32Array;

export interface EmbeddingModel {
  readonly dim: number;
  /** Stored with each collection so vectors from different models are never mixed. */
  readonly name: string;
  embed(text: string): Promise<EmbeddingVector>;
  embedMany(texts: readonly string[]): Promise<EmbeddingVector[]>;
}

/**
 * Deterministic local embedding using SHA-256 feature hashing over lower-cased
 * word tokens. Stable across runs and needs no network.
 */
export class LocalHashEmbedding implements EmbeddingModel {
  readonly dim: number;
  readonly name: string;
  private readonly buckets: number;
  private readonly tokenRegex = /[\p{L}\p{N}_']+/gu;

  constructor(dim = 384, buckets = 2048) {
    this.dim = dim;
    this.buckets = buckets;
    this.name = `local-hash-${dim}`;
  }

  async embed(text: string): Promise<EmbeddingVector> {
    return this.embedSync(text);
  }

  async embedMany(texts: readonly string[]): Promise<EmbeddingVector[]> {
    return texts.map((text) => this.embedSync(text));
  }

  private embedSync(text: string): EmbeddingVector {
    const vector = new Float32Array(this.dim);
    const tokens = text.toLowerCase().match(this.tokenRegex) ?? [];
    if (tokens.length === 0) return vector;

    for (const token of tokens) {
      const h = this.hash(token);
      const bucket = h % this.buckets;
      const sign = (h & 1) === 0 ? 1 : -1;
      const base = (bucket * 3) % this.dim;
      vector[base] += sign;
      vector[(base + 97) % this.dim] += sign * 0.5;
      vector[(base + 211) % this.dim] += sign * 0.25;
    }

    let sumSquares = 0;
    for (const value of vector) sumSquares += value * value;
    const norm = Math.sqrt(sumSquares);
    if (norm > 0) {
      for (let i = 0; i < vector.length; i++) vector[i] /= norm;
    }
    return vector;
  }

  private hash(input: string): number {
    return crypto.createHash("sha256").update(input).digest().readUInt32BE(0);
  }
}

export interface GeminiEmbeddingOptions {
  apiKey: string;
  model?: string;
  dim?: number;
}

/** Remote embeddings through the Gemini API. */
export class GeminiEmbedding implements EmbeddingModel {
  readonly dim: number;
  readonly name: string;
  private readonly client: GoogleGenAI;
  private readonly model: string;

  constructor(options: GeminiEmbeddingOptions) {
    this.model = options.model ?? "text-embedding-004";
    this.dim = options.dim ?? 768;
    this.name = `gemini-${this.model}`;
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
  }

  async embed(text: string): Promise<EmbeddingVector> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: readonly string[]): Promise<EmbeddingVector[]> {
    if (texts.length === 0) return [];
    const response = await this.client.models.embedContent({
      model: this.model,
      contents: [...texts],
    });
    const embeddings = response.embeddings ?? [];
    if (embeddings.length !== texts.length) {
      throw new UpstreamError(`Embedding service returned ${embeddings.length} vectors for ${texts.length} inputs`);
    }
    return embeddings.map((embedding, index) => {
      const values = embedding.values ?? [];
      if (values.length !== this.dim) {
        throw new UpstreamError(`Embedding ${index} has dimension ${values.length}, expected ${this.dim}`);
      }
      return Float32Array.from(values);
    });
  }
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) throw new Error("Vector size mismatch");
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const va = a[i];
    const vb = b[i];
    dot += va * vb;
    na += va * va;
    nb += vb * vb;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / (Math.sqrt(na) * Math.sqrt(nb));
}

export function cosineDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  return 1 - cosineSimilarity(a, b);
}

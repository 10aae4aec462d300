// Interview Signal Engine - Embedding similarity
// Text embeddings for evidence ranking, behind an EmbeddingProvider interface:
//   - OpenAIEmbeddingProvider: OpenAI embeddings API
//   - LexicalEmbeddingProvider: hashed bag-of-words, in-process and deterministic
// EmbeddingCache deduplicates texts within one assessment run so each distinct
// text is embedded once.

import { createConsoleLogger, type Logger } from "./logger.js";

export interface EmbeddingProvider {
  readonly name: string;
  /** One vector per input text, in input order. */
  embed(texts: string[]): Promise<number[][]>;
}

/** Cosine similarity in [-1, 1]. Zero, empty or mismatched vectors give 0. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

// ─── OpenAI ─────────────────────────────────────────────────────────────────────

/** Minimal interface for the OpenAI `embeddings.create()` surface we use. */
export interface OpenAIEmbeddingClient {
  embeddings: {
    create(params: { model: string; input: string[] }): Promise<{
      data: Array<{ embedding: number[]; index: number }>;
    }>;
  };
}

/** Inputs per embeddings request. */
const OPENAI_BATCH_SIZE = 512;

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name: string;

  constructor(
    private readonly client: OpenAIEmbeddingClient,
    private readonly model: string = "text-embedding-3-small",
  ) {
    this.name = `openai:${model}`;
  }

  async embed(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let offset = 0; offset < texts.length; offset += OPENAI_BATCH_SIZE) {
      const batch = texts.slice(offset, offset + OPENAI_BATCH_SIZE);
      const response = await this.client.embeddings.create({ model: this.model, input: batch });
      if (response.data.length !== batch.length) {
        throw new Error(`Embeddings response has ${response.data.length} vectors for ${batch.length} inputs`);
      }
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      vectors.push(...ordered.map((d) => d.embedding));
    }
    return vectors;
  }
}

// ─── Lexical ────────────────────────────────────────────────────────────────────

const STOPWORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "but", "by", "for", "from", "has", "have", "i",
  "in", "is", "it", "its", "me", "my", "of", "on", "or", "so", "that", "the", "their", "this",
  "to", "was", "we", "were", "with", "you",
]);

/** Lowercase word tokens without stopwords, with common suffixes stripped. */
export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? [])
    .filter((token) => !STOPWORDS.has(token))
    .map(stem)
    .filter((token) => token.length > 1);
}

function stem(token: string): string {
  for (const suffix of ["ing", "ed", "es", "s"]) {
    if (token.length > suffix.length + 3 && token.endsWith(suffix)) {
      return token.slice(0, -suffix.length);
    }
  }
  return token;
}

/** 32-bit FNV-1a. */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash;
}

/**
 * Hashed term-frequency vectors. Similarity reflects shared vocabulary only;
 * used when no embeddings API is configured.
 */
export class LexicalEmbeddingProvider implements EmbeddingProvider {
  readonly name = "lexical";

  constructor(private readonly dimensions: number = 512) {}

  async embed(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimensions).fill(0);
    for (const token of tokenize(text)) {
      vector[fnv1a(token) % this.dimensions] += 1;
    }
    return vector;
  }
}

// ─── Per-run Cache ──────────────────────────────────────────────────────────────

export class EmbeddingCache {
  private readonly vectors = new Map<string, number[]>();
  private readonly log: Logger;

  constructor(
    private readonly provider: EmbeddingProvider,
    logger?: Logger,
  ) {
    this.log = logger ?? createConsoleLogger("EmbeddingCache");
  }

  /** Embed every text not seen before in one provider call, then return all vectors in order. */
  async embedAll(texts: string[]): Promise<number[][]> {
    const missing = [...new Set(texts.filter((t) => !this.vectors.has(t)))];
    if (missing.length > 0) {
      const vectors = await this.provider.embed(missing);
      if (vectors.length !== missing.length) {
        throw new Error(`${this.provider.name} returned ${vectors.length} vectors for ${missing.length} texts`);
      }
      missing.forEach((text, i) => this.vectors.set(text, vectors[i]));
      this.log.debug(`Embedded ${missing.length} texts with ${this.provider.name}`);
    }
    return texts.map((t) => this.vectors.get(t) ?? []);
  }
}

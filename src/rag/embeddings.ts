/*
Incident RAG - Embedding providers
GPL-2.0-only
*/

import crypto from "node:crypto";
import type { AxiosInstance } from "axios";
import type { EmbeddingConfig } from "../config.js";
import { createLoggingHttpClient } from "../httpClient.js";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import { EmbeddingDegradedError } from "./errors.js";

export interface EmbeddingProvider {
  readonly name: string;
  readonly dimension: number;
  /** Number of records embedded and written per store call during ingestion. */
  readonly writeBatchSize: number;
  /** One vector per input text, in input order. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

export const REMOTE_MAX_CHARS = 2000;

export interface RemoteEmbeddingOptions {
  url: string;
  model: string;
  dimension: number;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: PrefixedLogger;
}

/**
 * Calls an Ollama-compatible `/api/embeddings` endpoint once per text.
 * A failed text gets a zero vector instead of failing the batch.
 */
export class RemoteEmbeddingProvider implements EmbeddingProvider {
  readonly name = "remote";
  readonly dimension: number;
  readonly writeBatchSize = 10;
  private readonly url: string;
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly http: AxiosInstance;
  private readonly log: PrefixedLogger;
  private degraded = 0;
  // Length the endpoint actually returns; placeholders follow it once known.
  private observedDimension: number | undefined;

  constructor(options: RemoteEmbeddingOptions) {
    this.url = `${options.url.replace(/\/+$/, "")}/api/embeddings`;
    this.model = options.model;
    this.dimension = options.dimension;
    this.timeoutMs = options.timeoutMs;
    this.http = options.http ?? createLoggingHttpClient(undefined, loggerFor("embeddings"));
    this.log = options.logger ?? loggerFor("embeddings");
  }

  /** Texts that received a placeholder vector since construction. */
  get degradedCount(): number {
    return this.degraded;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (const text of texts) {
      try {
        vectors.push(await this.embedOne(text));
      } catch (error) {
        this.degraded += 1;
        this.log.warn(`embedding_degraded chars=${text.length} error=${formatErrorMessage(error)}`);
        vectors.push(new Array<number>(this.observedDimension ?? this.dimension).fill(0));
      }
    }
    return vectors;
  }

  private async embedOne(text: string): Promise<number[]> {
    const response = await this.http.post<unknown>(
      this.url,
      { model: this.model, prompt: text.slice(0, REMOTE_MAX_CHARS) },
      { timeout: this.timeoutMs },
    );
    const body = response.data;
    const embedding = body && typeof body === "object" && "embedding" in body ? body.embedding : undefined;
    if (!isNumberArray(embedding) || embedding.length === 0) {
      throw new EmbeddingDegradedError("Embedding response did not contain a vector", {
        details: { status: response.status },
      });
    }
    if (this.observedDimension === undefined) {
      if (embedding.length !== this.dimension) {
        this.log.warn(`endpoint returned dimension=${embedding.length}, configured=${this.dimension}`);
      }
      this.observedDimension = embedding.length;
    }
    return embedding;
  }
}

type FeatureExtractor = (texts: string[], options: { pooling: "mean"; normalize: boolean }) => Promise<unknown>;

/**
 * Sentence-transformer model run in-process through transformers.js.
 * The model is loaded once by {@link LocalModelEmbeddingProvider.load}.
 */
export class LocalModelEmbeddingProvider implements EmbeddingProvider {
  readonly name = "local";
  readonly writeBatchSize = 50;

  private constructor(
    private readonly extractor: FeatureExtractor,
    readonly dimension: number,
  ) {}

  static async load(model: string, dimension: number): Promise<LocalModelEmbeddingProvider> {
    const log = loggerFor("embeddings");
    const startedAt = Date.now();
    const { pipeline } = await import("@huggingface/transformers");
    const extractor = await pipeline("feature-extraction", model);
    log.info(`loaded local model=${model} latencyMs=${Date.now() - startedAt}`);
    return new LocalModelEmbeddingProvider(
      (texts, options) => extractor(texts, options),
      dimension,
    );
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    const output = await this.extractor([...texts], { pooling: "mean", normalize: true });
    const rows = hasToList(output) ? output.tolist() : undefined;
    if (!Array.isArray(rows) || rows.length !== texts.length || !rows.every(isNumberArray)) {
      throw new Error("Local model returned an unexpected tensor shape");
    }
    return rows;
  }
}

/**
 * Deterministic local embedding using SHA-256 feature hashing.
 * Stable, cosine-comparable vectors without a model or a network.
 */
export class HashEmbeddingProvider implements EmbeddingProvider {
  readonly name = "hash";
  readonly writeBatchSize = 50;
  readonly dimension: number;
  private readonly numHashBuckets: number;
  private readonly tokenRegex = /[\p{L}\p{N}_]+/gu;

  constructor(dimension: number = 384, numHashBuckets: number = 2048) {
    this.dimension = dimension;
    this.numHashBuckets = numHashBuckets;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.embedOne(text));
  }

  private embedOne(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);
    const tokens = text.toLowerCase().match(this.tokenRegex) ?? [];
    for (const token of tokens) {
      const h = this.hash(token);
      const bucket = h % this.numHashBuckets;
      const sign = (h & 1) === 0 ? 1 : -1;

      const base = (bucket * 3) % this.dimension;
      vector[base] += sign * 1.0;
      vector[(base + 97) % this.dimension] += sign * 0.5;
      vector[(base + 211) % this.dimension] += sign * 0.25;
    }

    const norm = Math.hypot(...vector);
    return norm > 0 ? vector.map((value) => value / norm) : vector;
  }

  private hash(input: string): number {
    const digest = crypto.createHash("sha256").update(input).digest();
    return digest.readUInt32BE(0);
  }
}

export async function createEmbeddingProvider(config: EmbeddingConfig): Promise<EmbeddingProvider> {
  switch (config.provider) {
    case "remote":
      return new RemoteEmbeddingProvider(config);
    case "local":
      return LocalModelEmbeddingProvider.load(config.model, config.dimension);
    case "hash":
      return new HashEmbeddingProvider(config.dimension);
  }
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "number" && Number.isFinite(entry));
}

function hasToList(value: unknown): value is { tolist(): unknown } {
  return typeof value === "object" && value !== null && "tolist" in value && typeof value.tolist === "function";
}

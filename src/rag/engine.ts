/*
Incident RAG - Engine facade
GPL-2.0-only
*/

import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { describeError } from "./errors.js";
import type { IngestionPipeline } from "./ingestion.js";
import type { LayoutCache } from "./layout.js";
import type { SimilaritySearch } from "./search.js";
import type { ClearResult, IngestResult, LayoutResult, SearchResult, SourceKind, StatsResult } from "./types.js";
import type { ManagedCollection, MetadataFilter } from "./vectorStore.js";

export interface IncidentRagEngineParts {
  collection: ManagedCollection;
  embedder: EmbeddingProvider;
  ingestion: IngestionPipeline;
  search: SimilaritySearch;
  layout: LayoutCache;
  logger?: PrefixedLogger;
}

/**
 * The four public operations plus `clear`. Every method resolves to a
 * JSON-serialisable envelope; none of them rejects.
 */
export class IncidentRagEngine {
  private readonly log: PrefixedLogger;

  constructor(private readonly parts: IncidentRagEngineParts) {
    this.log = parts.logger ?? loggerFor("engine");
  }

  ingest(source: string, kind: SourceKind = "file"): Promise<IngestResult> {
    return this.parts.ingestion.ingest(source, kind);
  }

  search(query: string, topK?: number, filters?: MetadataFilter): Promise<SearchResult> {
    return this.parts.search.search(query, topK, filters);
  }

  layout(useCache: boolean = true): Promise<LayoutResult> {
    return this.parts.layout.layout(useCache);
  }

  async stats(): Promise<StatsResult> {
    try {
      const collection = await this.parts.collection.current();
      const total = await collection.count();
      return {
        total_incidents: total,
        collection_name: collection.name,
        has_data: total > 0,
        embedding_provider: this.parts.embedder.name,
        embedding_dimension: this.parts.embedder.dimension,
        cache: await this.parts.layout.cacheInfo(),
        rag_ready: total > 0,
      };
    } catch (error) {
      this.log.error(`stats failed error=${formatErrorMessage(error)}`);
      return { error: describeError(error).error, total_incidents: 0, has_data: false, rag_ready: false };
    }
  }

  async clear(): Promise<ClearResult> {
    try {
      await this.parts.collection.reset();
      await this.parts.layout.invalidate();
      this.log.info(`cleared collection=${this.parts.collection.name}`);
      return { success: true, message: `Collection ${this.parts.collection.name} cleared` };
    } catch (error) {
      this.log.error(`clear failed error=${formatErrorMessage(error)}`);
      return { error: describeError(error).error };
    }
  }
}

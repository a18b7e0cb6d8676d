/*
Incident RAG - Similarity search
GPL-2.0-only
*/

import { formatErrorMessage, loggerFor, summarizeText, type PrefixedLogger } from "../logger.js";
import { DISPLAY_CLAIMED_KEYS, DISPLAY_FIELDS, resolveField } from "./aliases.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { describeError } from "./errors.js";
import type { DisplayMetadata, IncidentMetadata, SearchResult, SimilarIncident } from "./types.js";
import { effectiveQueryLimit, type CollectionSource, type MetadataFilter, type QueryHit } from "./vectorStore.js";

/** Results must score strictly above this to be returned. */
export const SIMILARITY_THRESHOLD = 0.3;
export const PREVIEW_LENGTH = 300;
export const DESCRIPTION_FALLBACK_LENGTH = 200;
export const DEFAULT_TOP_K = 5;

export class SimilaritySearch {
  private readonly log: PrefixedLogger;

  constructor(
    private readonly collection: CollectionSource,
    private readonly embedder: EmbeddingProvider,
    logger?: PrefixedLogger,
  ) {
    this.log = logger ?? loggerFor("search");
  }

  async search(query: string, topK: number = DEFAULT_TOP_K, filters?: MetadataFilter): Promise<SearchResult> {
    const startedAt = Date.now();
    try {
      const [embedding] = await this.embedder.embed([query]);
      const collection = await this.collection.current();
      const filter = filters && Object.keys(filters).length > 0 ? filters : undefined;
      const hits = await collection.query(embedding, effectiveQueryLimit(topK), filter);

      const similar = hits
        .map((hit) => ({ hit, score: 1 - hit.distance }))
        .filter(({ score }) => score > SIMILARITY_THRESHOLD)
        .map(({ hit, score }) => toSimilarIncident(hit, score));

      const elapsed = Date.now() - startedAt;
      this.log.info(
        `query="${summarizeText(query)}" topK=${topK} hits=${hits.length} kept=${similar.length} latencyMs=${elapsed}`,
      );
      return { query, similar_incidents: similar, total_found: similar.length, search_time_ms: elapsed };
    } catch (error) {
      this.log.error(`search failed query="${summarizeText(query)}" error=${formatErrorMessage(error)}`);
      return { query, ...describeError(error), similar_incidents: [] };
    }
  }
}

function toSimilarIncident(hit: QueryHit, score: number): SimilarIncident {
  return {
    id: hit.id,
    similarity_score: score,
    text: hit.document.slice(0, PREVIEW_LENGTH),
    full_text: hit.document,
    metadata: displayMetadata(hit),
  };
}

/**
 * Canonical display fields resolved by alias priority, followed by every
 * metadata key no display field claims.
 */
export function displayMetadata(hit: Pick<QueryHit, "id" | "document" | "metadata">): DisplayMetadata {
  const metadata: IncidentMetadata = hit.metadata;
  const passthrough: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata)) {
    if (!DISPLAY_CLAIMED_KEYS.has(key)) passthrough[key] = value;
  }

  return {
    ...passthrough,
    ID: resolveField(metadata, DISPLAY_FIELDS.ID, hit.id),
    Proyecto: resolveField(metadata, DISPLAY_FIELDS.Proyecto),
    Fecha: resolveField(metadata, DISPLAY_FIELDS.Fecha),
    Descripción: resolveField(metadata, DISPLAY_FIELDS.Descripción, hit.document.slice(0, DESCRIPTION_FALLBACK_LENGTH)),
    Solución: resolveField(metadata, DISPLAY_FIELDS.Solución),
    Estado: resolveField(metadata, DISPLAY_FIELDS.Estado),
    Prioridad: resolveField(metadata, DISPLAY_FIELDS.Prioridad),
  };
}

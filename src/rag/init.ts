/*
Incident RAG - Engine bootstrap
GPL-2.0-only
*/

import { loadConfig, type IncidentRagConfig } from "../config.js";
import { createLoggingHttpClient } from "../httpClient.js";
import { loggerFor } from "../logger.js";
import { ChromaVectorStore } from "./chromaStore.js";
import { createEmbeddingProvider, type EmbeddingProvider } from "./embeddings.js";
import { IncidentRagEngine } from "./engine.js";
import { IngestionPipeline } from "./ingestion.js";
import { LayoutCache } from "./layout.js";
import { SimilaritySearch } from "./search.js";
import { ManagedCollection, type VectorStore } from "./vectorStore.js";

export interface InitOptions {
  config?: IncidentRagConfig;
  /** Replaces the Chroma store built from `config.chroma`. */
  store?: VectorStore;
  /** Replaces the provider selected by `config.embedding`. */
  embedder?: EmbeddingProvider;
}

export async function initIncidentRag(options: InitOptions = {}): Promise<IncidentRagEngine> {
  const config = options.config ?? loadConfig();
  const log = loggerFor("rag");

  const store = options.store ?? new ChromaVectorStore({ url: config.chroma.url });
  const embedder = options.embedder ?? (await createEmbeddingProvider(config.embedding));
  const collection = new ManagedCollection(store, config.collection);
  const http = createLoggingHttpClient({ headers: { "User-Agent": "incident-rag" } }, loggerFor("scrape"));

  log.info(
    `ready collection=${config.collection} embedding=${embedder.name} dimension=${embedder.dimension} dataDir=${config.dataDir}`,
  );

  return new IncidentRagEngine({
    collection,
    embedder,
    ingestion: new IngestionPipeline({
      collection,
      embedder,
      http,
      dataDir: config.dataDir,
      scrapeTimeoutMs: config.scrape.timeoutMs,
    }),
    search: new SimilaritySearch(collection, embedder),
    layout: new LayoutCache(collection, config.dataDir),
  });
}

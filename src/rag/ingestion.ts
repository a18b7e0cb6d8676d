/*
Incident RAG - Ingestion pipeline
GPL-2.0-only
*/

import type { AxiosInstance } from "axios";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import type { EmbeddingProvider } from "./embeddings.js";
import { describeError, NoDataError } from "./errors.js";
import { documentText, recordMetadata } from "./normalizer.js";
import { loadFileIncidents, scrapeIncidents } from "./sources.js";
import type { IncidentRecord, IngestResult, SourceKind, StoredEntry } from "./types.js";
import type { CollectionSource } from "./vectorStore.js";

export interface IngestionOptions {
  collection: CollectionSource;
  embedder: EmbeddingProvider;
  http: AxiosInstance;
  dataDir: string;
  scrapeTimeoutMs: number;
  logger?: PrefixedLogger;
}

export class IngestionPipeline {
  private readonly log: PrefixedLogger;

  constructor(private readonly options: IngestionOptions) {
    this.log = options.logger ?? loggerFor("ingest");
  }

  async ingest(source: string, kind: SourceKind = "file"): Promise<IngestResult> {
    const startedAt = Date.now();
    try {
      const records = await this.load(source, kind);
      if (records.length === 0) {
        throw new NoDataError(`No incidents found in ${source}`, { details: { source, kind } });
      }
      await this.write(records);
      this.log.info(`ingested source=${source} kind=${kind} incidents=${records.length} latencyMs=${Date.now() - startedAt}`);
      return { success: true, incidents_loaded: records.length, source, source_type: kind };
    } catch (error) {
      this.log.error(`ingest failed source=${source} kind=${kind} error=${formatErrorMessage(error)}`);
      return describeError(error);
    }
  }

  load(source: string, kind: SourceKind): Promise<IncidentRecord[]> {
    return kind === "url"
      ? scrapeIncidents(source, this.options.http, this.options.scrapeTimeoutMs)
      : loadFileIncidents(source, this.options.dataDir);
  }

  /**
   * Embed and store records in batches of `writeBatchSize`. A batch that the
   * store rejects on `add` is written once more with `upsert`; a failing upsert propagates.
   */
  async write(records: readonly IncidentRecord[]): Promise<void> {
    const { embedder } = this.options;
    const collection = await this.options.collection.current();
    const batchSize = Math.max(1, embedder.writeBatchSize);

    for (let start = 0; start < records.length; start += batchSize) {
      const batch = records.slice(start, start + batchSize);
      const documents = batch.map(documentText);
      const embeddings = await embedder.embed(documents);
      const entries: StoredEntry[] = batch.map((record, index) => ({
        id: record.id,
        document: documents[index],
        embedding: embeddings[index],
        metadata: recordMetadata(record),
      }));

      try {
        await collection.add(entries);
      } catch (error) {
        this.log.warn(`add rejected, retrying as upsert batch=${start / batchSize} size=${entries.length} error=${formatErrorMessage(error)}`);
        await collection.upsert(entries);
      }
    }
  }
}

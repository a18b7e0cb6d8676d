/*
Incident RAG - Chroma vector store adapter
GPL-2.0-only
*/

import { ChromaClient, IncludeEnum, type Collection } from "chromadb";
import { formatErrorMessage, loggerFor, type PrefixedLogger } from "../logger.js";
import { IncidentRagError, StoreConflictError, StoreFailureError } from "./errors.js";
import type { IncidentMetadata, StoredEntry } from "./types.js";
import {
  collapseDuplicateIds,
  duplicateIds,
  effectiveQueryLimit,
  type CollectionDump,
  type MetadataFilter,
  type QueryHit,
  type VectorCollection,
  type VectorStore,
} from "./vectorStore.js";

const COLLECTION_METADATA = {
  "hnsw:space": "cosine",
  description: "Incident records for semantic search",
};

const DUPLICATE_MESSAGE_RE = /duplicate|already exist/i;

type ChromaWhere = Record<string, string> | { $and: Array<Record<string, string>> };

export class ChromaVectorStore implements VectorStore {
  private readonly client: ChromaClient;
  private readonly log: PrefixedLogger;

  constructor(options: { url: string; client?: ChromaClient; logger?: PrefixedLogger }) {
    this.client = options.client ?? new ChromaClient({ path: options.url });
    this.log = options.logger ?? loggerFor("store");
  }

  async openOrCreate(name: string): Promise<VectorCollection> {
    const collection = await guard(`open collection ${name}`, () =>
      this.client.getOrCreateCollection({ name, metadata: COLLECTION_METADATA }),
    );
    this.log.debug(`collection ready name=${name}`);
    return new ChromaCollection(collection, this.log);
  }

  async deleteCollection(name: string): Promise<void> {
    await guard(`delete collection ${name}`, () => this.client.deleteCollection({ name }));
    this.log.info(`collection deleted name=${name}`);
  }
}

class ChromaCollection implements VectorCollection {
  constructor(
    private readonly collection: Collection,
    private readonly log: PrefixedLogger,
  ) {}

  get name(): string {
    return this.collection.name;
  }

  async add(entries: readonly StoredEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const repeated = duplicateIds(entries);
    if (repeated.length > 0) {
      throw new StoreConflictError(repeated);
    }

    const ids = entries.map((entry) => entry.id);
    const existing = await guard("look up ids", () => this.collection.get({ ids, include: [] }));
    if (existing.ids.length > 0) {
      throw new StoreConflictError(existing.ids);
    }

    try {
      await this.collection.add(toChromaBatch(entries));
    } catch (error) {
      if (error instanceof Error && DUPLICATE_MESSAGE_RE.test(error.message)) {
        throw new StoreConflictError(ids, { cause: error });
      }
      throw new StoreFailureError(`add failed: ${formatErrorMessage(error)}`, { cause: error });
    }
  }

  async upsert(entries: readonly StoredEntry[]): Promise<void> {
    if (entries.length === 0) return;
    const unique = collapseDuplicateIds(entries);
    if (unique.length !== entries.length) {
      this.log.warn(`upsert collapsed repeated ids batch=${entries.length} unique=${unique.length}`);
    }
    await guard("upsert", () => this.collection.upsert(toChromaBatch(unique)));
  }

  async query(embedding: readonly number[], k: number, filter?: MetadataFilter): Promise<QueryHit[]> {
    const nResults = effectiveQueryLimit(k);
    if (nResults === 0) return [];
    const where = toWhere(filter);

    const result = await guard("query", () =>
      this.collection.query({
        queryEmbeddings: [[...embedding]],
        nResults,
        ...(where ? { where } : {}),
        include: [IncludeEnum.Documents, IncludeEnum.Metadatas, IncludeEnum.Distances],
      }),
    );

    const ids = result.ids[0] ?? [];
    const distances = result.distances?.[0] ?? [];
    const documents = result.documents?.[0] ?? [];
    const metadatas = result.metadatas?.[0] ?? [];

    return ids.slice(0, nResults).map((id, index) => ({
      id,
      distance: distances[index] ?? 1,
      document: documents[index] ?? "",
      metadata: toStringRecord(metadatas[index]),
    }));
  }

  async count(): Promise<number> {
    return guard("count", () => this.collection.count());
  }

  async getAll(): Promise<CollectionDump> {
    const result = await guard("get", () =>
      this.collection.get({ include: [IncludeEnum.Documents, IncludeEnum.Metadatas] }),
    );
    return {
      ids: result.ids,
      documents: result.ids.map((_, index) => result.documents?.[index] ?? ""),
      metadatas: result.ids.map((_, index) => toStringRecord(result.metadatas?.[index])),
    };
  }
}

function toChromaBatch(entries: readonly StoredEntry[]) {
  return {
    ids: entries.map((entry) => entry.id),
    embeddings: entries.map((entry) => [...entry.embedding]),
    metadatas: entries.map((entry) => ({ ...entry.metadata })),
    documents: entries.map((entry) => entry.document),
  };
}

/** Chroma takes a single equality as `{ key: value }` and several only under `$and`. */
export function toWhere(filter?: MetadataFilter): ChromaWhere | undefined {
  if (!filter) return undefined;
  const clauses = Object.entries(filter).map(([key, value]) => ({ [key]: value }));
  if (clauses.length === 0) return undefined;
  if (clauses.length === 1) return clauses[0];
  return { $and: clauses };
}

function toStringRecord(metadata: Record<string, unknown> | null | undefined): IncidentMetadata {
  const result: IncidentMetadata = {};
  if (!metadata) return result;
  for (const [key, value] of Object.entries(metadata)) {
    if (value === null || value === undefined) continue;
    result[key] = String(value);
  }
  return result;
}

async function guard<T>(operation: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof IncidentRagError) throw error;
    throw new StoreFailureError(`${operation} failed: ${formatErrorMessage(error)}`, { cause: error });
  }
}

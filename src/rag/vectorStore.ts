/*
Incident RAG - Vector store contract
GPL-2.0-only
*/

import type { IncidentMetadata, StoredEntry } from "./types.js";

/** Upper bound on neighbours returned by a single query, whatever `k` the caller asks for. */
export const MAX_QUERY_RESULTS = 50;

/** Field → value equality constraints on stored metadata. */
export type MetadataFilter = Readonly<Record<string, string>>;

export interface QueryHit {
  id: string;
  distance: number; // cosine distance, 0 = identical
  document: string;
  metadata: IncidentMetadata;
}

export interface CollectionDump {
  ids: string[];
  documents: string[];
  metadatas: IncidentMetadata[];
}

export interface VectorCollection {
  readonly name: string;
  /** Strict insert; rejects with StoreConflictError when an id already exists. */
  add(entries: readonly StoredEntry[]): Promise<void>;
  /** Insert or replace by id. */
  upsert(entries: readonly StoredEntry[]): Promise<void>;
  /** Nearest neighbours first, at most `min(k, MAX_QUERY_RESULTS)` of them. */
  query(embedding: readonly number[], k: number, filter?: MetadataFilter): Promise<QueryHit[]>;
  count(): Promise<number>;
  /** Every stored entry without its embedding. */
  getAll(): Promise<CollectionDump>;
}

export interface VectorStore {
  /** Returns the named collection, creating it empty when absent. Never fails on "already exists". */
  openOrCreate(name: string): Promise<VectorCollection>;
  deleteCollection(name: string): Promise<void>;
}

export function effectiveQueryLimit(k: number): number {
  if (!Number.isFinite(k) || k < 1) return 0;
  return Math.min(Math.floor(k), MAX_QUERY_RESULTS);
}

/** Keeps the last entry for each id, in first-seen id order. */
export function collapseDuplicateIds(entries: readonly StoredEntry[]): StoredEntry[] {
  const byId = new Map<string, StoredEntry>();
  for (const entry of entries) {
    byId.set(entry.id, entry);
  }
  return [...byId.values()];
}

/** Ids that occur more than once in a batch. */
export function duplicateIds(entries: readonly StoredEntry[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const entry of entries) {
    if (seen.has(entry.id)) duplicates.add(entry.id);
    seen.add(entry.id);
  }
  return [...duplicates];
}

/** Where consumers get the live collection; `reset` swaps it for a fresh empty one. */
export interface CollectionSource {
  readonly name: string;
  current(): Promise<VectorCollection>;
}

/** Opens the named collection on first use and keeps the handle. */
export class ManagedCollection implements CollectionSource {
  private handle: Promise<VectorCollection> | null = null;

  constructor(
    private readonly store: VectorStore,
    readonly name: string,
  ) {}

  current(): Promise<VectorCollection> {
    return this.handle ?? this.track(this.store.openOrCreate(this.name));
  }

  /**
   * Delete the collection and recreate it empty. Callers of `current()` wait
   * for the recreated handle while the reset is in flight.
   */
  reset(): Promise<VectorCollection> {
    return this.track(this.store.deleteCollection(this.name).then(() => this.store.openOrCreate(this.name)));
  }

  private track(opening: Promise<VectorCollection>): Promise<VectorCollection> {
    // A failed open is retried on the next call.
    opening.catch(() => {
      if (this.handle === opening) this.handle = null;
    });
    this.handle = opening;
    return opening;
  }
}

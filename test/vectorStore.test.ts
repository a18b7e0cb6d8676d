import { describe, expect, it, vi } from "vitest";
import {
  MAX_QUERY_RESULTS,
  ManagedCollection,
  collapseDuplicateIds,
  duplicateIds,
  effectiveQueryLimit,
  type VectorCollection,
  type VectorStore,
} from "../src/rag/vectorStore.js";
import { MemoryVectorStore, entry } from "./support/memoryStore.js";

describe("effectiveQueryLimit", () => {
  it("caps k at the query maximum", () => {
    expect(effectiveQueryLimit(5)).toBe(5);
    expect(effectiveQueryLimit(MAX_QUERY_RESULTS)).toBe(50);
    expect(effectiveQueryLimit(500)).toBe(50);
  });

  it("returns zero for k below one or not finite", () => {
    expect(effectiveQueryLimit(0)).toBe(0);
    expect(effectiveQueryLimit(-3)).toBe(0);
    expect(effectiveQueryLimit(Number.NaN)).toBe(0);
  });

  it("floors fractional k", () => {
    expect(effectiveQueryLimit(2.9)).toBe(2);
  });
});

describe("duplicate handling", () => {
  const batch = [entry("a", [1]), entry("b", [2]), entry("a", [3])];

  it("lists ids that repeat within a batch", () => {
    expect(duplicateIds(batch)).toEqual(["a"]);
    expect(duplicateIds([entry("x", [1])])).toEqual([]);
  });

  it("keeps the last entry per id in first-seen order", () => {
    expect(collapseDuplicateIds(batch).map((item) => [item.id, item.embedding[0]])).toEqual([
      ["a", 3],
      ["b", 2],
    ]);
  });
});

describe("ManagedCollection", () => {
  it("opens the collection once and reuses the handle", async () => {
    const store = new MemoryVectorStore();
    const managed = new ManagedCollection(store, "incidents");

    const first = await managed.current();
    const second = await managed.current();

    expect(first).toBe(second);
    expect(store.opened).toBe(1);
  });

  it("reset deletes and recreates the collection empty", async () => {
    const store = new MemoryVectorStore();
    const managed = new ManagedCollection(store, "incidents");
    const before = await managed.current();
    await before.add([entry("a", [1, 0])]);

    const after = await managed.reset();

    expect(after).not.toBe(before);
    expect(await after.count()).toBe(0);
    expect(await managed.current()).toBe(after);
  });

  it("hands out the recreated collection to callers arriving during a reset", async () => {
    const store = new MemoryVectorStore();
    const managed = new ManagedCollection(store, "incidents");
    const before = await managed.current();
    let finishDelete = () => {};
    const deleteCollection = store.deleteCollection.bind(store);
    store.deleteCollection = (name) =>
      new Promise<void>((resolve) => {
        finishDelete = () => resolve(deleteCollection(name));
      });

    const resetting = managed.reset();
    const during = managed.current();
    finishDelete();
    const after = await resetting;

    expect(await during).toBe(after);
    expect(after).not.toBe(before);
    expect(await managed.current()).toBe(store.collections.get("incidents"));
  });

  it("retries opening after a reset whose delete failed", async () => {
    const store = new MemoryVectorStore();
    const managed = new ManagedCollection(store, "incidents");
    const before = await managed.current();
    store.deleteCollection = async () => {
      throw new Error("store offline");
    };

    await expect(managed.reset()).rejects.toThrow("store offline");
    expect(await managed.current()).toBe(before);
  });

  it("retries opening after a failure", async () => {
    const collection: VectorCollection = await new MemoryVectorStore().openOrCreate("incidents");
    const openOrCreate = vi
      .fn<VectorStore["openOrCreate"]>()
      .mockRejectedValueOnce(new Error("store offline"))
      .mockResolvedValue(collection);
    const managed = new ManagedCollection({ openOrCreate, deleteCollection: vi.fn(async () => undefined) }, "incidents");

    await expect(managed.current()).rejects.toThrow("store offline");
    await expect(managed.current()).resolves.toBe(collection);
    expect(openOrCreate).toHaveBeenCalledTimes(2);
  });
});

import { beforeEach, describe, expect, it, vi } from "vitest";
import { StoreConflictError, StoreFailureError } from "../src/rag/errors.js";
import { ChromaVectorStore, toWhere } from "../src/rag/chromaStore.js";
import { entry } from "./support/memoryStore.js";

const chroma = vi.hoisted(() => {
  const collection = {
    name: "incidents",
    add: vi.fn(),
    upsert: vi.fn(),
    query: vi.fn(),
    count: vi.fn(),
    get: vi.fn(),
  };
  const constructed: unknown[] = [];
  return {
    collection,
    getOrCreateCollection: vi.fn(async () => collection),
    deleteCollection: vi.fn(async () => undefined),
    constructed,
  };
});

vi.mock("chromadb", () => ({
  ChromaClient: class {
    constructor(options: unknown) {
      chroma.constructed.push(options);
    }
    getOrCreateCollection = chroma.getOrCreateCollection;
    deleteCollection = chroma.deleteCollection;
  },
  IncludeEnum: { Documents: "documents", Metadatas: "metadatas", Distances: "distances" },
}));

describe("toWhere", () => {
  it("passes a single equality through and combines several under $and", () => {
    expect(toWhere(undefined)).toBeUndefined();
    expect(toWhere({})).toBeUndefined();
    expect(toWhere({ Proyecto: "A" })).toEqual({ Proyecto: "A" });
    expect(toWhere({ Proyecto: "A", Estado: "Abierto" })).toEqual({
      $and: [{ Proyecto: "A" }, { Estado: "Abierto" }],
    });
  });
});

describe("ChromaVectorStore", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    chroma.constructed.length = 0;
    chroma.collection.get.mockResolvedValue({ ids: [] });
  });

  it("opens a cosine collection on the configured server", async () => {
    const store = new ChromaVectorStore({ url: "http://chroma.test:8000" });
    const collection = await store.openOrCreate("incidents");

    expect(chroma.constructed).toEqual([{ path: "http://chroma.test:8000" }]);
    expect(chroma.getOrCreateCollection).toHaveBeenCalledWith({
      name: "incidents",
      metadata: { "hnsw:space": "cosine", description: "Incident records for semantic search" },
    });
    expect(collection.name).toBe("incidents");
  });

  it("adds new entries in Chroma's column layout", async () => {
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");
    await collection.add([entry("a", [1, 0], { Proyecto: "A" }, "doc a")]);

    expect(chroma.collection.get).toHaveBeenCalledWith({ ids: ["a"], include: [] });
    expect(chroma.collection.add).toHaveBeenCalledWith({
      ids: ["a"],
      embeddings: [[1, 0]],
      metadatas: [{ Proyecto: "A" }],
      documents: ["doc a"],
    });
  });

  it("rejects ids that already exist", async () => {
    chroma.collection.get.mockResolvedValue({ ids: ["a"] });
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");

    const failure = collection.add([entry("a", [1]), entry("b", [1])]);

    await expect(failure).rejects.toBeInstanceOf(StoreConflictError);
    await expect(failure).rejects.toMatchObject({ ids: ["a"] });
    expect(chroma.collection.add).not.toHaveBeenCalled();
  });

  it("rejects ids repeated within the batch", async () => {
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");
    await expect(collection.add([entry("a", [1]), entry("a", [2])])).rejects.toBeInstanceOf(StoreConflictError);
  });

  it("wraps other backend errors as store failures", async () => {
    chroma.collection.add.mockRejectedValueOnce(new Error("disk full"));
    chroma.collection.count.mockRejectedValueOnce(new Error("socket hang up"));
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");

    await expect(collection.add([entry("a", [1])])).rejects.toBeInstanceOf(StoreFailureError);
    await expect(collection.count()).rejects.toThrow("count failed: socket hang up");
  });

  it("collapses repeated ids before upserting", async () => {
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");
    await collection.upsert([entry("a", [1]), entry("a", [2])]);

    expect(chroma.collection.upsert).toHaveBeenCalledWith({
      ids: ["a"],
      embeddings: [[2]],
      metadatas: [{}],
      documents: ["doc a"],
    });
  });

  it("queries with a capped result count and maps hits", async () => {
    chroma.collection.query.mockResolvedValue({
      ids: [["x", "y"]],
      distances: [[0.1, 0.4]],
      documents: [["doc x", null]],
      metadatas: [[{ Proyecto: "A", n: 3 }, null]],
    });
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");

    const hits = await collection.query([0.5, 0.5], 120, { Proyecto: "A" });

    expect(chroma.collection.query).toHaveBeenCalledWith({
      queryEmbeddings: [[0.5, 0.5]],
      nResults: 50,
      where: { Proyecto: "A" },
      include: ["documents", "metadatas", "distances"],
    });
    expect(hits).toEqual([
      { id: "x", distance: 0.1, document: "doc x", metadata: { Proyecto: "A", n: "3" } },
      { id: "y", distance: 0.4, document: "", metadata: {} },
    ]);
  });

  it("skips the backend when k is below one", async () => {
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");
    expect(await collection.query([1], 0)).toEqual([]);
    expect(chroma.collection.query).not.toHaveBeenCalled();
  });

  it("dumps all entries without embeddings", async () => {
    chroma.collection.get.mockResolvedValue({
      ids: ["a", "b"],
      documents: ["doc a", null],
      metadatas: [{ Proyecto: "A" }, null],
    });
    const collection = await new ChromaVectorStore({ url: "http://chroma.test" }).openOrCreate("incidents");

    expect(await collection.getAll()).toEqual({
      ids: ["a", "b"],
      documents: ["doc a", ""],
      metadatas: [{ Proyecto: "A" }, {}],
    });
    expect(chroma.collection.get).toHaveBeenCalledWith({ include: ["documents", "metadatas"] });
  });

  it("deletes collections by name", async () => {
    await new ChromaVectorStore({ url: "http://chroma.test" }).deleteCollection("incidents");
    expect(chroma.deleteCollection).toHaveBeenCalledWith({ name: "incidents" });
  });
});

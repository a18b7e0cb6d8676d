import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { toCallToolResult } from "../src/mcp-server.js";
import { HashEmbeddingProvider } from "../src/rag/embeddings.js";
import { initIncidentRag } from "../src/rag/init.js";
import { ToolValidationError, unknownErrorResult } from "../src/tools/errors.js";
import { envelopeResult } from "../src/tools/responses.js";
import { toolRegistry } from "../src/tools/registry.js";
import {
  booleanSchema,
  integerSchema,
  objectSchema,
  optionalSchema,
  stringRecordSchema,
  stringSchema,
} from "../src/tools/schema.js";
import type { ToolExecutionContext } from "../src/tools/types.js";
import { testConfig } from "./support/config.js";
import { MemoryVectorStore } from "./support/memoryStore.js";
import { recordingLogger } from "./support/recordingLogger.js";

describe("schema helpers", () => {
  interface Args extends Record<string, unknown> {
    name: string;
    mode?: "fast" | "slow";
    limit?: number;
    verbose?: boolean;
    tags?: Record<string, string>;
  }

  const schema = objectSchema<Args>({
    properties: {
      name: stringSchema({ minLength: 1 }),
      mode: optionalSchema(stringSchema({ enum: ["fast", "slow"] as const })),
      limit: optionalSchema(integerSchema({ minimum: 1, default: 5 })),
      verbose: optionalSchema(booleanSchema({ default: false })),
      tags: optionalSchema(stringRecordSchema()),
    },
    required: ["name"],
  });

  it("fills defaults of optional properties", () => {
    expect(schema.parse({ name: "x" })).toEqual({ name: "x", limit: 5, verbose: false });
    expect(schema.parse({ name: "x", mode: "slow", limit: 2, tags: { a: "b" } })).toEqual({
      name: "x",
      mode: "slow",
      limit: 2,
      verbose: false,
      tags: { a: "b" },
    });
  });

  it("describes the closed object", () => {
    expect(schema.jsonSchema).toMatchObject({
      type: "object",
      required: ["name"],
      additionalProperties: false,
      properties: {
        limit: { type: ["integer", "null"], minimum: 1, default: 5 },
        mode: { type: ["string", "null"], enum: ["fast", "slow"] },
      },
    });
  });

  it("rejects invalid input with the failing path", () => {
    const failure = (input: unknown) => {
      try {
        schema.parse(input);
      } catch (error) {
        if (error instanceof ToolValidationError) return [error.message, error.path];
        throw error;
      }
      return null;
    };

    expect(failure({})).toEqual(["Missing required property", "$.name"]);
    expect(failure({ name: "x", other: 1 })).toEqual(["Unexpected property", "$.other"]);
    expect(failure({ name: "" })).toEqual(["String must have length ≥ 1", "$.name"]);
    expect(failure({ name: "x", mode: "medium" })).toEqual(["Value must be one of the allowed options", "$.mode"]);
    expect(failure({ name: "x", limit: 1.5 })).toEqual(["Expected an integer", "$.limit"]);
    expect(failure({ name: "x", limit: 0 })).toEqual(["Value is below minimum", "$.limit"]);
    expect(failure({ name: "x", tags: { a: 1 } })).toEqual(["Expected a string", "$.tags.a"]);
    expect(failure(["x"])).toEqual(["Expected an object", "$"]);
  });
});

describe("tool errors", () => {
  it("formats tool errors with their path and metadata", () => {
    const result = unknownErrorResult(new ToolValidationError("Missing required property", { path: "$.query" }));

    expect(result).toEqual({
      content: [{ type: "text", text: "Missing required property (at $.query)" }],
      metadata: { error: { kind: "validation", path: "$.query" } },
      isError: true,
    });
  });

  it("keeps validation details and wraps unknown failures", () => {
    const rejected = new ToolValidationError("Value is below minimum", { path: "$.top_k", details: { minimum: 1 } });
    expect(unknownErrorResult(rejected).metadata).toEqual({
      error: { kind: "validation", path: "$.top_k", details: { minimum: 1 } },
    });
    expect(unknownErrorResult(new Error("store down")).content).toEqual([{ type: "text", text: "store down" }]);
    expect(unknownErrorResult("boom")).toEqual({
      content: [{ type: "text", text: "boom" }],
      metadata: { error: { kind: "unknown" } },
      isError: true,
    });
  });

  it("marks envelopes carrying an error as failed", () => {
    expect(envelopeResult({ error: "no data" }, { source: "x" })).toEqual({
      content: [{ type: "text", text: JSON.stringify({ error: "no data" }, null, 2) }],
      structuredContent: { type: "json", data: { error: "no data" } },
      metadata: { source: "x", success: false, error: { kind: "engine" } },
      isError: true,
    });
    expect(envelopeResult({ success: true }).isError).toBeUndefined();
  });
});

describe("tool registry", () => {
  it("lists the incident tools with merged tags and hints", () => {
    const tools = toolRegistry.list();

    expect(tools.map((tool) => tool.name)).toEqual([
      "incidents_load",
      "incidents_search",
      "incidents_stats",
      "incidents_layout",
      "incidents_clear",
    ]);
    const search = tools[1];
    expect(search.metadata.tags).toEqual(["incidents", "rag", "search"]);
    expect(search.metadata.workflowHints).toEqual([
      "Load a source with incidents_load before searching an empty collection.",
      "Mention the similarity score and the Solución field of the best matches.",
    ]);
    expect(search.inputSchema.required).toEqual(["query"]);
    expect(new Set(tools.map((tool) => tool.metadata.domain))).toEqual(new Set(["incidents"]));
  });
});

describe("incident tools", () => {
  let root: string;
  let ctx: ToolExecutionContext;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "incident-tools-"));
    await fs.mkdir(path.join(root, "data"), { recursive: true });
    await fs.writeFile(
      path.join(root, "data", "incidents.csv"),
      "Proyecto,Descripción\nRed,Caída del enlace principal\nWeb,Error 500 en el checkout\n",
      "utf8",
    );
    const engine = await initIncidentRag({
      config: testConfig(root),
      store: new MemoryVectorStore(),
      embedder: new HashEmbeddingProvider(64),
    });
    ctx = { engine, logger: recordingLogger("tool") };
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("loads a file source", async () => {
    const result = await toolRegistry.invoke("incidents_load", { source: "incidents.csv" }, ctx);

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent?.data).toEqual({
      success: true,
      incidents_loaded: 2,
      source: "incidents.csv",
      source_type: "file",
    });
    expect(result.metadata).toEqual({ source: "incidents.csv", kind: "file", success: true });
  });

  it("returns engine failures as error results", async () => {
    const result = await toolRegistry.invoke("incidents_load", { source: "missing-for-tools.csv" }, ctx);

    expect(result.isError).toBe(true);
    expect(result.structuredContent?.data).toMatchObject({ error: "File not found: missing-for-tools.csv" });
    expect(result.metadata).toEqual({
      source: "missing-for-tools.csv",
      kind: "file",
      success: false,
      error: { kind: "engine" },
    });
  });

  it("searches with the default top_k", async () => {
    await toolRegistry.invoke("incidents_load", { source: "incidents.csv" }, ctx);

    const result = await toolRegistry.invoke("incidents_search", { query: "Caída del enlace principal" }, ctx);

    expect(result.isError).toBeUndefined();
    expect(result.structuredContent?.data).toMatchObject({ query: "Caída del enlace principal" });
    expect(result.metadata?.success).toBe(true);
  });

  it("rejects blank queries and bad top_k before touching the engine", async () => {
    const blank = await toolRegistry.invoke("incidents_search", { query: "   " }, ctx);
    const zero = await toolRegistry.invoke("incidents_search", { query: "vpn", top_k: 0 }, ctx);

    expect(blank.content).toEqual([{ type: "text", text: "String does not match required pattern (at $.query)" }]);
    expect(blank.isError).toBe(true);
    expect(zero.content).toEqual([{ type: "text", text: "Value is below minimum (at $.top_k)" }]);
  });

  it("reports stats, layout and clear", async () => {
    await toolRegistry.invoke("incidents_load", { source: "incidents.csv" }, ctx);

    const stats = await toolRegistry.invoke("incidents_stats", {}, ctx);
    const layout = await toolRegistry.invoke("incidents_layout", { use_cache: false }, ctx);
    const cleared = await toolRegistry.invoke("incidents_clear", undefined, ctx);

    expect(stats.structuredContent?.data).toMatchObject({ total_incidents: 2, has_data: true, rag_ready: true });
    expect(layout.structuredContent?.data).toMatchObject({ success: true, total_projects: 2 });
    expect(cleared.structuredContent?.data).toEqual({ success: true, message: "Collection incidents cleared" });
  });

  it("rejects unexpected arguments", async () => {
    const result = await toolRegistry.invoke("incidents_stats", { verbose: true }, ctx);

    expect(result.content).toEqual([{ type: "text", text: "Unexpected property (at $.verbose)" }]);
  });

  it("rejects unknown tool names", async () => {
    await expect(toolRegistry.invoke("incidents_drop", {}, ctx)).rejects.toThrow("Unknown tool: incidents_drop");
  });
});

describe("toCallToolResult", () => {
  it("maps run results onto the protocol shape", () => {
    expect(toCallToolResult(envelopeResult({ error: "x" }))).toEqual({
      content: [{ type: "text", text: JSON.stringify({ error: "x" }, null, 2) }],
      structuredContent: { type: "json", data: { error: "x" } },
      isError: true,
      _meta: { success: false, error: { kind: "engine" } },
    });
  });
});

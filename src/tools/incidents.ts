import { summarizeText } from "../logger.js";
import { DEFAULT_TOP_K } from "../rag/search.js";
import { MAX_QUERY_RESULTS } from "../rag/vectorStore.js";
import { defineToolModule, type ToolDefinition, type ToolExecutionContext, type ToolRunResult } from "./types.js";
import { booleanSchema, integerSchema, objectSchema, optionalSchema, stringRecordSchema, stringSchema } from "./schema.js";
import { envelopeResult } from "./responses.js";
import { unknownErrorResult } from "./errors.js";

interface LoadArgs extends Record<string, unknown> {
  source: string;
  kind?: "file" | "url";
}

const loadArgsSchema = objectSchema<LoadArgs>({
  description: "Load incidents from a CSV or JSON file, or scrape them from a web page.",
  properties: {
    source: stringSchema({
      description: "File name (looked up in the data directories) or page URL.",
      minLength: 1,
    }),
    kind: optionalSchema(
      stringSchema({
        description: "Source kind. Defaults to `file`.",
        enum: ["file", "url"] as const,
        default: "file",
      }),
    ),
  },
  required: ["source"],
});

interface SearchArgs extends Record<string, unknown> {
  query: string;
  top_k?: number;
  filters?: Record<string, string>;
}

const searchArgsSchema = objectSchema<SearchArgs>({
  description: "Find stored incidents similar to a free-text description.",
  properties: {
    query: stringSchema({
      description: "Text describing the problem to match.",
      minLength: 1,
      pattern: /\S/,
    }),
    top_k: optionalSchema(
      integerSchema({
        description: `Maximum number of neighbours to consider (results are capped at ${MAX_QUERY_RESULTS}).`,
        minimum: 1,
        default: DEFAULT_TOP_K,
      }),
    ),
    filters: optionalSchema(
      stringRecordSchema({
        description: "Metadata equality constraints, e.g. {\"Proyecto\": \"Portal\"}.",
      }),
    ),
  },
  required: ["query"],
});

interface LayoutArgs extends Record<string, unknown> {
  use_cache?: boolean;
}

const layoutArgsSchema = objectSchema<LayoutArgs>({
  description: "Project layout with one positioned sun per project.",
  properties: {
    use_cache: optionalSchema(
      booleanSchema({
        description: "Reuse the cached layout while it matches the collection size.",
        default: true,
      }),
    ),
  },
});

const emptyArgsSchema = objectSchema<Record<string, never>>({ properties: {} });

/** Parse errors and unexpected failures both come back as error results. */
function guarded(
  run: (args: unknown, ctx: ToolExecutionContext) => Promise<ToolRunResult>,
): (args: unknown, ctx: ToolExecutionContext) => Promise<ToolRunResult> {
  return async (args, ctx) => {
    try {
      return await run(args, ctx);
    } catch (error) {
      return unknownErrorResult(error);
    }
  };
}

const loadTool: ToolDefinition = {
  name: "incidents_load",
  description: "Ingest incidents from a CSV/JSON file or a web page into the vector collection.",
  summary: "Loads and embeds incidents; re-loading the same source replaces existing entries.",
  inputSchema: loadArgsSchema.jsonSchema,
  tags: ["ingest"],
  examples: [
    { name: "CSV file", description: "Load a CSV export", arguments: { source: "incidencias.csv" } },
    { name: "Status page", description: "Scrape a page", arguments: { source: "https://status.example.com", kind: "url" } },
  ],
  execute: guarded(async (args, ctx) => {
    const parsed = loadArgsSchema.parse(args);
    const kind = parsed.kind ?? "file";
    ctx.logger.debug("Loading incidents", { source: parsed.source, kind });
    const result = await ctx.engine.ingest(parsed.source, kind);
    return envelopeResult(result, { source: parsed.source, kind });
  }),
};

const searchTool: ToolDefinition = {
  name: "incidents_search",
  description: "Return stored incidents similar to the query, scored by embedding similarity.",
  summary: "Similarity search over stored incidents with optional metadata filters.",
  inputSchema: searchArgsSchema.jsonSchema,
  tags: ["search"],
  examples: [
    { name: "Login failure", description: "Find similar login problems", arguments: { query: "users cannot log in after update", top_k: 5 } },
  ],
  workflowHints: ["Mention the similarity score and the Solución field of the best matches."],
  execute: guarded(async (args, ctx) => {
    const parsed = searchArgsSchema.parse(args);
    ctx.logger.debug("Searching incidents", { query: summarizeText(parsed.query), topK: parsed.top_k });
    const result = await ctx.engine.search(parsed.query, parsed.top_k, parsed.filters);
    return envelopeResult(result, { count: "total_found" in result ? result.total_found : 0 });
  }),
};

const statsTool: ToolDefinition = {
  name: "incidents_stats",
  description: "Report collection size, embedding provider and layout cache state.",
  inputSchema: emptyArgsSchema.jsonSchema,
  tags: ["status"],
  execute: guarded(async (args, ctx) => {
    emptyArgsSchema.parse(args);
    return envelopeResult(await ctx.engine.stats());
  }),
};

const layoutTool: ToolDefinition = {
  name: "incidents_layout",
  description: "Group stored incidents by project into a deterministic 3-D layout.",
  inputSchema: layoutArgsSchema.jsonSchema,
  tags: ["layout"],
  execute: guarded(async (args, ctx) => {
    const parsed = layoutArgsSchema.parse(args);
    return envelopeResult(await ctx.engine.layout(parsed.use_cache ?? true));
  }),
};

const clearTool: ToolDefinition = {
  name: "incidents_clear",
  description: "Delete every stored incident and the layout cache.",
  inputSchema: emptyArgsSchema.jsonSchema,
  tags: ["admin"],
  workflowHints: ["Only call when the user explicitly asks to wipe the incident database."],
  execute: guarded(async (args, ctx) => {
    emptyArgsSchema.parse(args);
    return envelopeResult(await ctx.engine.clear());
  }),
};

export const incidentsModule = defineToolModule({
  domain: "incidents",
  defaultTags: ["incidents", "rag"],
  workflowHints: ["Load a source with incidents_load before searching an empty collection."],
  tools: [loadTool, searchTool, statsTool, layoutTool, clearTool],
});

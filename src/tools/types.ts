import type { Logger } from "../logger.js";
import type { IncidentRagEngine } from "../rag/engine.js";

/** The subset of JSON Schema the incident tools advertise. */
export type JsonSchema = {
  readonly type?: string | readonly string[];
  readonly description?: string;
  readonly properties?: Record<string, JsonSchema>;
  readonly required?: readonly string[];
  readonly enum?: readonly string[];
  readonly additionalProperties?: boolean | JsonSchema;
  readonly default?: unknown;
  readonly minLength?: number;
  readonly pattern?: string;
  readonly minimum?: number;
};

export interface ToolExample {
  readonly name: string;
  readonly description: string;
  readonly arguments: Record<string, unknown>;
}

export interface ToolExecutionContext {
  readonly engine: IncidentRagEngine;
  readonly logger: Logger;
}

export interface ToolTextContent {
  readonly type: "text";
  readonly text: string;
}

/**
 * Outcome of one tool call. Engine envelopes travel both as pretty-printed
 * JSON text and as `structuredContent`.
 */
export interface ToolRunResult {
  readonly content: ToolTextContent[];
  readonly structuredContent?: {
    readonly type: "json";
    readonly data: unknown;
  };
  readonly metadata?: Record<string, unknown>;
  readonly isError?: boolean;
}

export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly summary?: string;
  readonly inputSchema: JsonSchema;
  readonly examples?: readonly ToolExample[];
  readonly tags?: readonly string[];
  readonly workflowHints?: readonly string[];
  readonly execute: (args: unknown, ctx: ToolExecutionContext) => Promise<ToolRunResult>;
}

/** What `tools/list` publishes for a tool; `metadata` goes out as `_meta`. */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JsonSchema;
  readonly metadata: {
    readonly domain: string;
    readonly summary: string;
    readonly examples?: readonly ToolExample[];
    readonly tags: readonly string[];
    readonly workflowHints?: readonly string[];
  };
}

export interface ToolModuleConfig {
  readonly domain: string;
  /** Tags and hints shared by every tool of the module. */
  readonly defaultTags?: readonly string[];
  readonly workflowHints?: readonly string[];
  readonly tools: readonly ToolDefinition[];
}

export interface ToolModule {
  readonly domain: string;
  readonly tools: readonly ToolDescriptor[];
  invoke(name: string, args: unknown, ctx: ToolExecutionContext): Promise<ToolRunResult>;
}

export function defineToolModule(config: ToolModuleConfig): ToolModule {
  const defaultTags = config.defaultTags ?? [];
  const sharedHints = config.workflowHints ?? [];
  const toolMap = new Map(config.tools.map((tool) => [tool.name, tool]));

  const tools = config.tools.map((tool): ToolDescriptor => {
    const workflowHints = mergeUnique(sharedHints, tool.workflowHints);
    return {
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
      metadata: {
        domain: config.domain,
        summary: tool.summary ?? tool.description,
        ...(tool.examples ? { examples: tool.examples } : {}),
        tags: mergeUnique(defaultTags, tool.tags),
        ...(workflowHints.length > 0 ? { workflowHints } : {}),
      },
    };
  });

  return {
    domain: config.domain,
    tools: Object.freeze(tools),
    async invoke(name, args, ctx) {
      const tool = toolMap.get(name);
      if (!tool) {
        throw new Error(`Unknown tool in ${config.domain}: ${name}`);
      }
      return tool.execute(args, ctx);
    },
  };
}

function mergeUnique(base: readonly string[], extra?: readonly string[]): readonly string[] {
  if (!extra || extra.length === 0) {
    return base;
  }
  return Array.from(new Set([...base, ...extra]));
}

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { loadConfig } from "./config.js";
import { initIncidentRag } from "./rag/init.js";
import type { IncidentRagEngine } from "./rag/engine.js";
import { toolRegistry, type ToolRegistry } from "./tools/registry.js";
import { unknownErrorResult } from "./tools/errors.js";
import type { ToolRunResult } from "./tools/types.js";
import { loggerFor, payloadByteLength, formatPayloadForDebug, formatErrorMessage } from "./logger.js";

export const SERVER_NAME = "incident-rag";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(engine: IncidentRagEngine, registry: ToolRegistry = toolRegistry): Server {
  const toolLogger = loggerFor("tool");

  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const startedAt = Date.now();
    const response = {
      tools: registry.list().map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: {
          type: "object" as const,
          properties: tool.inputSchema.properties ?? {},
          ...(tool.inputSchema.required ? { required: [...tool.inputSchema.required] } : {}),
          additionalProperties: tool.inputSchema.additionalProperties ?? false,
        },
        _meta: tool.metadata,
      })),
    };
    const latency = Date.now() - startedAt;
    const bytes = payloadByteLength(response);
    toolLogger.info(`list tools count=${response.tools.length} bytes=${bytes} latencyMs=${latency}`);

    if (toolLogger.isDebugEnabled()) {
      toolLogger.debug("list tools response", { response: formatPayloadForDebug(response) });
    }

    return response;
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name } = request.params;
    const args = request.params.arguments ?? {};
    const startedAt = Date.now();
    if (toolLogger.isDebugEnabled()) {
      toolLogger.debug("tool request", {
        name,
        arguments: formatPayloadForDebug(args),
      });
    }

    try {
      const result = await registry.invoke(name, args, { engine, logger: toolLogger });

      const response = toCallToolResult(result);
      const latency = Date.now() - startedAt;
      const bytes = payloadByteLength(response);
      const status = result.isError ? "error" : "ok";

      toolLogger.info(`call tool name=${name} status=${status} bytes=${bytes} latencyMs=${latency}`);

      if (toolLogger.isDebugEnabled()) {
        toolLogger.debug("tool response", {
          name,
          response: formatPayloadForDebug(response),
        });
      }

      return response;
    } catch (error) {
      const latency = Date.now() - startedAt;
      const response = toCallToolResult(unknownErrorResult(error));
      const bytes = payloadByteLength(response);

      toolLogger.error(`call tool name=${name} status=failed bytes=${bytes} latencyMs=${latency} error=${formatErrorMessage(error)}`);

      return response;
    }
  });

  return server;
}

export function toCallToolResult(result: ToolRunResult): {
  content: ToolRunResult["content"];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
  _meta?: Record<string, unknown>;
} {
  return {
    content: [...result.content],
    ...(result.structuredContent !== undefined ? { structuredContent: { ...result.structuredContent } } : {}),
    ...(result.isError ? { isError: true } : {}),
    ...(result.metadata !== undefined ? { _meta: result.metadata } : {}),
  };
}

export async function runStdioServer(): Promise<void> {
  console.error(`Starting ${SERVER_NAME} MCP server...`);

  const config = loadConfig();
  const engine = await initIncidentRag({ config });
  const server = createMcpServer(engine);

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const stats = await engine.stats();
  if ("error" in stats) {
    console.error(`Vector store not reachable at ${config.chroma.url}: ${stats.error}`);
  } else {
    console.error(`Collection ${stats.collection_name} holds ${stats.total_incidents} incidents`);
  }

  console.error(`${SERVER_NAME} MCP server running on stdio`);
}

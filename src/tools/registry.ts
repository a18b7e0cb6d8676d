import type { ToolDescriptor, ToolExecutionContext, ToolModule, ToolRunResult } from "./types.js";
import { ToolValidationError } from "./errors.js";
import { incidentsModule } from "./incidents.js";

export interface ToolRegistry {
  list(): readonly ToolDescriptor[];
  invoke(name: string, args: unknown, ctx: ToolExecutionContext): Promise<ToolRunResult>;
}

export function createToolRegistry(modules: readonly ToolModule[]): ToolRegistry {
  const owners = new Map<string, ToolModule>();
  for (const module of modules) {
    for (const descriptor of module.tools) {
      if (owners.has(descriptor.name)) {
        throw new Error(`Duplicate tool name: ${descriptor.name}`);
      }
      owners.set(descriptor.name, module);
    }
  }

  return {
    list() {
      return modules.flatMap((module) => module.tools);
    },
    async invoke(name, args, ctx) {
      const module = owners.get(name);
      if (!module) {
        throw new ToolValidationError(`Unknown tool: ${name}`, {
          details: { available: Array.from(owners.keys()).sort() },
        });
      }
      return module.invoke(name, args, ctx);
    },
  };
}

export const toolRegistry = createToolRegistry([incidentsModule]);

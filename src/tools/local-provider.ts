import { ToolInvocationError } from "../infra/errors.js";
import type { ToolDescriptor } from "../agent/types.js";
import type { ToolDefinition, ToolProvider } from "./types.js";

export function toDescriptor(tool: ToolDefinition): ToolDescriptor {
  return {
    name: tool.name,
    description: tool.description,
    parameterSchema: tool.parameterSchema,
  };
}

/** Serves tool definitions from inside the current process. */
export function createLocalToolProvider(tools: readonly ToolDefinition[]): ToolProvider {
  const byName = new Map(tools.map((t) => [t.name, t]));

  return {
    listTools: async () => tools.map(toDescriptor),
    callTool: async (name, args, session) => {
      const tool = byName.get(name);
      if (!tool) {
        throw new ToolInvocationError(name, `Unknown tool: ${name}`);
      }
      return tool.execute(args, session);
    },
  };
}

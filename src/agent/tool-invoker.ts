import { errorMessage } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { truncate } from "../utils.js";
import type { SessionContext } from "../tools/session-context.js";
import type { ToolProvider } from "../tools/types.js";
import type { ToolCatalog } from "./tool-catalog.js";
import type { ToolCallRequest } from "./types.js";

const log = createLogger("tool-invoker");

const LOG_PREVIEW_LENGTH = 200;

export type ToolInvocationResult = {
  call: ToolCallRequest;
  content: string;
  isError: boolean;
};

export type BatchOptions = {
  concurrent?: boolean;
  onStart?: (call: ToolCallRequest) => void;
  onResult?: (result: ToolInvocationResult) => void;
};

export type ToolInvoker = {
  /** Always resolves; failures come back as text for the model to read. */
  invoke: (call: ToolCallRequest) => Promise<ToolInvocationResult>;
  /**
   * Runs a batch. Results and callbacks follow request order even when
   * the calls run concurrently and finish out of order.
   */
  invokeBatch: (calls: readonly ToolCallRequest[], options?: BatchOptions) => Promise<ToolInvocationResult[]>;
};

export function unknownToolMessage(name: string): string {
  return `Unknown tool: ${name}`;
}

export function createToolInvoker(params: {
  catalog: ToolCatalog;
  provider: ToolProvider;
  session: SessionContext;
}): ToolInvoker {
  const { catalog, provider, session } = params;

  const invoke = async (call: ToolCallRequest): Promise<ToolInvocationResult> => {
    if (!catalog.get(call.toolName)) {
      log.warn(`Model requested unknown tool "${call.toolName}"`);
      return { call, content: unknownToolMessage(call.toolName), isError: true };
    }
    try {
      const content = await provider.callTool(call.toolName, call.arguments, session);
      log.debug(`${call.toolName} -> ${truncate(content, LOG_PREVIEW_LENGTH)}`);
      return { call, content, isError: false };
    } catch (err) {
      const content = `Error calling ${call.toolName}: ${errorMessage(err)}`;
      log.warn(truncate(content, LOG_PREVIEW_LENGTH));
      return { call, content, isError: true };
    }
  };

  return {
    invoke,
    async invokeBatch(calls, options) {
      if (options?.concurrent) {
        calls.forEach((call) => options.onStart?.(call));
        const results = await Promise.all(calls.map((call) => invoke(call)));
        results.forEach((result) => options.onResult?.(result));
        return results;
      }
      const results: ToolInvocationResult[] = [];
      for (const call of calls) {
        options?.onStart?.(call);
        const result = await invoke(call);
        options?.onResult?.(result);
        results.push(result);
      }
      return results;
    },
  };
}

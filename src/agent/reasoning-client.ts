import { ReasoningUnavailableError, errorMessage } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import type { LlmClient, LlmResponse, LlmToolDefinition } from "./llm-client.js";
import type { ToolCatalog } from "./tool-catalog.js";
import type { Transcript } from "./transcript.js";
import type { Decision, ToolCallRequest } from "./types.js";

const log = createLogger("reasoning");

export type CompleteOptions = {
  /** Keep the tools defined but forbid calling them, forcing a text answer. */
  withoutTools?: boolean;
};

export type ReasoningClient = {
  complete: (transcript: Transcript, catalog: ToolCatalog, options?: CompleteOptions) => Promise<Decision>;
};

export function toToolDefinitions(catalog: ToolCatalog): LlmToolDefinition[] {
  return catalog.list().map((t) => ({
    name: t.name,
    description: t.description,
    parameters: t.parameterSchema,
  }));
}

/** Tool results are matched to calls by id, so a batch needs unique, non-empty ids. */
function checkToolCallIds(calls: readonly ToolCallRequest[]): void {
  const seen = new Set<string>();
  for (const call of calls) {
    if (call.id.trim().length === 0) {
      throw new ReasoningUnavailableError(`model returned a ${call.toolName} call without an id`);
    }
    if (seen.has(call.id)) {
      throw new ReasoningUnavailableError("model returned duplicate tool call ids");
    }
    seen.add(call.id);
  }
}

export function createReasoningClient(params: { llm: LlmClient; temperature: number }): ReasoningClient {
  const { llm, temperature } = params;

  return {
    async complete(transcript, catalog, options) {
      const tools = toToolDefinitions(catalog);
      let response: LlmResponse;
      try {
        response = await llm.sendMessage({
          messages: transcript.messages(),
          ...(tools.length > 0 ? { tools } : {}),
          ...(tools.length > 0 && options?.withoutTools ? { toolChoice: "none" as const } : {}),
          temperature,
        });
      } catch (err) {
        throw new ReasoningUnavailableError(errorMessage(err), err);
      }

      if (response.usage) {
        log.debug(`${llm.provider} usage: in=${response.usage.inputTokens} out=${response.usage.outputTokens}`);
      }

      if (response.toolCalls && response.toolCalls.length > 0) {
        if (response.text) {
          log.debug(`Discarding text sent alongside tool calls: ${response.text}`);
        }
        checkToolCallIds(response.toolCalls);
        return { kind: "tool_requests", calls: response.toolCalls };
      }
      return { kind: "final", text: response.text ?? "" };
    },
  };
}

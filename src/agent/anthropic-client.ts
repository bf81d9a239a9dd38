import Anthropic from "@anthropic-ai/sdk";
import type { LlmClient, LlmResponse, LlmSendParams, LlmToolDefinition } from "./llm-client.js";
import { isRecord } from "./llm-client.js";
import { isToolCallMessage } from "./types.js";
import type { Message, ToolCallRequest } from "./types.js";

export type AnthropicClientOptions = {
  apiKey: string;
  model?: string;
  maxTokens?: number;
};

const DEFAULT_MODEL = "claude-sonnet-4-5-20250929";
const DEFAULT_MAX_TOKENS = 4096;

/**
 * Anthropic has no system or tool roles: system text travels separately and
 * consecutive tool results are folded into one user message of
 * `tool_result` blocks.
 */
export function toAnthropicMessages(messages: readonly Message[]): {
  system: string | undefined;
  messages: Anthropic.Messages.MessageParam[];
} {
  const systemParts: string[] = [];
  const result: Anthropic.Messages.MessageParam[] = [];
  let i = 0;
  while (i < messages.length) {
    const msg = messages[i];
    if (!msg) {
      break;
    }
    if (msg.role === "system") {
      systemParts.push(msg.content);
      i++;
    } else if (msg.role === "user") {
      result.push({ role: "user", content: msg.content });
      i++;
    } else if (isToolCallMessage(msg)) {
      result.push({
        role: "assistant",
        content: msg.toolCalls.map((tc) => ({
          type: "tool_use" as const,
          id: tc.id,
          name: tc.toolName,
          input: tc.arguments,
        })),
      });
      i++;
    } else if (msg.role === "assistant") {
      // The API rejects empty assistant content.
      if (msg.content.trim().length > 0) {
        result.push({ role: "assistant", content: msg.content });
      }
      i++;
    } else {
      const toolResults: Anthropic.Messages.ToolResultBlockParam[] = [];
      let next = messages[i];
      while (next && next.role === "tool") {
        toolResults.push({
          type: "tool_result",
          tool_use_id: next.toolCallId,
          content: next.content,
        });
        i++;
        next = messages[i];
      }
      result.push({ role: "user", content: toolResults });
    }
  }
  return {
    system: systemParts.length > 0 ? systemParts.join("\n\n") : undefined,
    messages: result,
  };
}

function toAnthropicTools(tools: LlmToolDefinition[]): Anthropic.Messages.Tool[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: { ...t.parameters, type: "object" as const },
  }));
}

function toAnthropicToolChoice(choice: "auto" | "none"): Anthropic.Messages.ToolChoice {
  return choice === "none" ? { type: "none" } : { type: "auto" };
}

export function createAnthropicClient(options: AnthropicClientOptions): LlmClient {
  const client = new Anthropic({ apiKey: options.apiKey });
  const model = options.model ?? DEFAULT_MODEL;
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;

  return {
    provider: "anthropic",
    async sendMessage(params: LlmSendParams): Promise<LlmResponse> {
      const { system, messages } = toAnthropicMessages(params.messages);
      const tools = params.tools && params.tools.length > 0 ? toAnthropicTools(params.tools) : undefined;

      let response: Anthropic.Messages.Message;
      try {
        response = await client.messages.create({
          model,
          max_tokens: maxTokens,
          system,
          messages,
          tools,
          ...(tools && params.toolChoice ? { tool_choice: toAnthropicToolChoice(params.toolChoice) } : {}),
          temperature: params.temperature,
        });
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`Anthropic API call failed: ${detail}`);
      }

      let text = "";
      const toolCalls: ToolCallRequest[] = [];

      for (const block of response.content) {
        if (block.type === "text") {
          text += block.text;
        } else if (block.type === "tool_use") {
          toolCalls.push({
            id: block.id,
            toolName: block.name,
            arguments: isRecord(block.input) ? block.input : {},
          });
        }
      }

      return {
        text: text.length > 0 ? text : null,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    },
  };
}

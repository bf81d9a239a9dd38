import OpenAI, { AzureOpenAI } from "openai";
import type { LlmClient, LlmResponse, LlmSendParams, LlmToolDefinition } from "./llm-client.js";
import { isRecord } from "./llm-client.js";
import { isToolCallMessage } from "./types.js";
import type { Message, ToolArguments, ToolCallRequest } from "./types.js";
import { createLogger } from "../logging.js";

const log = createLogger("openai");

const DEFAULT_MAX_TOKENS = 4096;
const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";
const DEFAULT_OPENAI_MODEL = "gpt-4o";
const DEFAULT_OPENROUTER_MODEL = "openai/gpt-4o";

export type OpenAiCompatibleOptions =
  | { provider: "openai"; apiKey: string; model?: string; maxTokens?: number }
  | { provider: "openrouter"; apiKey: string; model?: string; maxTokens?: number }
  | {
      provider: "azure";
      apiKey: string;
      endpoint: string;
      apiVersion: string;
      deployment: string;
      maxTokens?: number;
    };

function toOpenAITools(tools: LlmToolDefinition[]): OpenAI.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: t.parameters,
    },
  }));
}

export function toOpenAIMessages(messages: readonly Message[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((m): OpenAI.ChatCompletionMessageParam => {
    if (m.role === "tool") {
      return { role: "tool", tool_call_id: m.toolCallId, content: m.content };
    }
    if (isToolCallMessage(m)) {
      return {
        role: "assistant",
        content: null,
        tool_calls: m.toolCalls.map((tc) => ({
          id: tc.id,
          type: "function" as const,
          function: { name: tc.toolName, arguments: JSON.stringify(tc.arguments) },
        })),
      };
    }
    if (m.role === "assistant") {
      return { role: "assistant", content: m.content };
    }
    if (m.role === "system") {
      return { role: "system", content: m.content };
    }
    return { role: "user", content: m.content };
  });
}

function parseArguments(name: string, raw: string): ToolArguments {
  try {
    const parsed: unknown = JSON.parse(raw);
    if (isRecord(parsed)) {
      return parsed;
    }
    log.warn(`Tool call arguments for ${name} are not an object`);
  } catch {
    log.warn(`Failed to parse tool call arguments for ${name}`);
  }
  return {};
}

function createSdkClient(options: OpenAiCompatibleOptions): { client: OpenAI; model: string } {
  switch (options.provider) {
    case "azure":
      return {
        client: new AzureOpenAI({
          apiKey: options.apiKey,
          endpoint: options.endpoint,
          apiVersion: options.apiVersion,
          deployment: options.deployment,
        }),
        model: options.deployment,
      };
    case "openrouter":
      return {
        client: new OpenAI({ baseURL: OPENROUTER_BASE_URL, apiKey: options.apiKey }),
        model: options.model ?? DEFAULT_OPENROUTER_MODEL,
      };
    case "openai":
      return {
        client: new OpenAI({ apiKey: options.apiKey }),
        model: options.model ?? DEFAULT_OPENAI_MODEL,
      };
  }
}

/** Chat Completions client for OpenAI, Azure OpenAI and OpenRouter. */
export function createOpenAiCompatibleClient(options: OpenAiCompatibleOptions): LlmClient {
  const { client, model } = createSdkClient(options);
  const maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  const label = options.provider;

  return {
    provider: label,
    async sendMessage(params: LlmSendParams): Promise<LlmResponse> {
      const tools =
        params.tools && params.tools.length > 0
          ? toOpenAITools(params.tools)
          : undefined;

      let response: OpenAI.ChatCompletion;
      try {
        response = await client.chat.completions.create({
          model,
          max_tokens: maxTokens,
          messages: toOpenAIMessages(params.messages),
          tools,
          ...(tools && params.toolChoice ? { tool_choice: params.toolChoice } : {}),
          temperature: params.temperature,
        });
      } catch (error) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new Error(`${label} API call failed: ${detail}`);
      }

      const choice = response.choices[0];
      if (!choice) {
        throw new Error(`${label} returned no choices in response`);
      }

      const message = choice.message;
      const toolCalls: ToolCallRequest[] = (message.tool_calls ?? [])
        .filter((tc) => tc.type === "function")
        .map((tc) => ({
          id: tc.id,
          toolName: tc.function.name,
          arguments: parseArguments(tc.function.name, tc.function.arguments),
        }));

      return {
        text: message.content ?? null,
        toolCalls: toolCalls.length > 0 ? toolCalls : undefined,
        usage: response.usage
          ? {
              inputTokens: response.usage.prompt_tokens ?? 0,
              outputTokens: response.usage.completion_tokens ?? 0,
            }
          : undefined,
      };
    },
  };
}

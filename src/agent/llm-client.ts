import type { Message, ToolCallRequest } from "./types.js";

export type LlmToolDefinition = {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
};

export type LlmSendParams = {
  messages: readonly Message[];
  tools?: LlmToolDefinition[];
  /** "none" keeps the tools defined but forbids calling them. Ignored when no tools are sent. */
  toolChoice?: "auto" | "none";
  temperature?: number;
};

export type LlmResponse = {
  text: string | null;
  toolCalls?: ToolCallRequest[];
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
};

export type LlmClient = {
  readonly provider: string;
  /** One request/response exchange with the model. Rejects on transport, auth or API errors. */
  sendMessage: (params: LlmSendParams) => Promise<LlmResponse>;
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export type LlmProvider = "azure" | "openai" | "openrouter" | "anthropic";

export type AgentConfig = {
  provider?: LlmProvider;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Ceiling on reasoning/tool rounds within one user turn. */
  maxToolRounds?: number;
  /** Issue the tool calls of one batch concurrently. Transcript order is unaffected. */
  concurrentTools?: boolean;
  systemPrompt?: string;
};

export type ToolProviderMode = "local" | "remote";

export type ToolsConfig = {
  mode?: ToolProviderMode;
  /** Base URL of the tool server when `mode` is "remote". */
  url?: string;
  timeoutMs?: number;
};

export type ServicesConfig = {
  baseUrl?: string;
  host?: string;
  port?: number;
  /** Start the mock services inside the chat process. */
  embedded?: boolean;
};

export type ToolServerConfig = {
  host?: string;
  port?: number;
};

export type ConciergeConfig = {
  agent?: AgentConfig;
  tools?: ToolsConfig;
  services?: ServicesConfig;
  toolServer?: ToolServerConfig;
};

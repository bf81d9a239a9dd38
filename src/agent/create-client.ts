import type { ConciergeConfig } from "../config/types.js";
import { resolveProvider } from "../config/config.js";
import { ConfigError } from "../infra/errors.js";
import { readAzureOpenAiEnv, requireEnv } from "../infra/env.js";
import type { LlmClient } from "./llm-client.js";
import { createAnthropicClient } from "./anthropic-client.js";
import { createOpenAiCompatibleClient } from "./openai-client.js";

export function createLlmClient(config: ConciergeConfig): LlmClient {
  const provider = resolveProvider(config);
  const model = config.agent?.model;
  const maxTokens = config.agent?.maxTokens;

  try {
    switch (provider) {
      case "azure": {
        const env = readAzureOpenAiEnv();
        return createOpenAiCompatibleClient({
          provider: "azure",
          apiKey: env.apiKey,
          endpoint: env.endpoint,
          apiVersion: env.apiVersion,
          deployment: model ?? env.deployment,
          maxTokens,
        });
      }
      case "openai":
        return createOpenAiCompatibleClient({
          provider: "openai",
          apiKey: requireEnv("OPENAI_API_KEY"),
          model,
          maxTokens,
        });
      case "openrouter":
        return createOpenAiCompatibleClient({
          provider: "openrouter",
          apiKey: requireEnv("OPENROUTER_API_KEY"),
          model,
          maxTokens,
        });
      case "anthropic":
        return createAnthropicClient({
          apiKey: requireEnv("ANTHROPIC_API_KEY"),
          model,
          maxTokens,
        });
    }
  } catch (err) {
    throw new ConfigError(`Cannot configure the ${provider} provider: ${err instanceof Error ? err.message : String(err)}`);
  }
}

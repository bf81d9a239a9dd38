import type { ConciergeConfig } from "./config/types.js";
import {
  resolveMaxToolRounds,
  resolveServicesBaseUrl,
  resolveTemperature,
  resolveToolServerUrl,
  resolveToolTimeout,
} from "./config/config.js";
import { AgentLoop } from "./agent/agent-loop.js";
import type { LlmClient } from "./agent/llm-client.js";
import { buildSystemPrompt } from "./agent/prompt.js";
import { createReasoningClient } from "./agent/reasoning-client.js";
import { loadToolCatalog } from "./agent/tool-catalog.js";
import type { ToolCatalog } from "./agent/tool-catalog.js";
import { createToolInvoker } from "./agent/tool-invoker.js";
import { Transcript } from "./agent/transcript.js";
import { createDefaultTools } from "./tools/definitions.js";
import { createHttpToolProvider } from "./tools/http-provider.js";
import { createLocalToolProvider } from "./tools/local-provider.js";
import { createServicesClient } from "./tools/services-client.js";
import { SessionContext } from "./tools/session-context.js";
import type { ToolProvider } from "./tools/types.js";

export function createToolProvider(config: ConciergeConfig): ToolProvider {
  const timeoutMs = resolveToolTimeout(config);
  if (config.tools?.mode === "remote") {
    return createHttpToolProvider({ url: resolveToolServerUrl(config), timeoutMs });
  }
  const services = createServicesClient({ baseUrl: resolveServicesBaseUrl(config), timeoutMs });
  return createLocalToolProvider(createDefaultTools(services));
}

export type Conversation = {
  loop: AgentLoop;
  catalog: ToolCatalog;
  transcript: Transcript;
  session: SessionContext;
};

/**
 * Loads the catalog (fatal on failure) and assembles one conversation with
 * its own transcript and session context.
 */
export async function createConversation(params: {
  config: ConciergeConfig;
  provider: ToolProvider;
  llm: LlmClient;
  now?: Date;
}): Promise<Conversation> {
  const { config, provider, llm } = params;
  const catalog = await loadToolCatalog(provider);
  const session = new SessionContext();
  const transcript = new Transcript(
    buildSystemPrompt({ config, now: params.now, toolNames: catalog.names() }),
  );
  const loop = new AgentLoop({
    transcript,
    catalog,
    reasoning: createReasoningClient({ llm, temperature: resolveTemperature(config) }),
    invoker: createToolInvoker({ catalog, provider, session }),
    maxToolRounds: resolveMaxToolRounds(config),
    concurrentTools: config.agent?.concurrentTools,
  });
  return { loop, catalog, transcript, session };
}

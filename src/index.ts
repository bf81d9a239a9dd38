#!/usr/bin/env node
import { loadDotenv } from "./infra/dotenv.js";
import { errorMessage, formatError } from "./infra/errors.js";
import { startHttpServer } from "./infra/serve.js";
import type { RunningServer } from "./infra/serve.js";
import { applyLogLevel, logger as log } from "./logging.js";
import { loadConfig, resolveProvider, resolveServicesHost, resolveServicesPort } from "./config/config.js";
import { createLlmClient } from "./agent/create-client.js";
import { createConversation, createToolProvider } from "./bootstrap.js";
import { runRepl } from "./cli/repl.js";
import { createServicesApp } from "./services/app.js";

const cleanupFns: (() => Promise<void> | void)[] = [];

async function runCleanup(): Promise<void> {
  for (const cleanup of cleanupFns.reverse()) {
    try {
      await cleanup();
    } catch (err) {
      log.warn(`Cleanup failed: ${formatError(err)}`);
    }
  }
  cleanupFns.length = 0;
}

async function main(): Promise<void> {
  // 1. Environment and config
  loadDotenv();
  applyLogLevel();
  const config = loadConfig();
  log.info(`LLM provider: ${resolveProvider(config)}`);

  // 2. Mock services, when hosted in-process
  if (config.services?.embedded !== false && config.tools?.mode !== "remote") {
    const services: RunningServer = await startHttpServer(createServicesApp(), {
      name: "Mock services",
      hostname: resolveServicesHost(config),
      port: resolveServicesPort(config),
    });
    cleanupFns.push(() => services.close());
  }

  // 3. Reasoning client and tools
  const llm = createLlmClient(config);
  const provider = createToolProvider(config);
  cleanupFns.push(() => provider.close?.());
  const conversation = await createConversation({ config, provider, llm });

  // 4. Chat until quit or end of input
  await runRepl({ loop: conversation.loop, toolNames: conversation.catalog.names() });
  await runCleanup();
}

process.on("unhandledRejection", (err) => {
  log.error(`Unhandled rejection: ${formatError(err)}`);
});

main().then(
  () => process.exit(0),
  async (err: unknown) => {
    log.fatal(`Fatal error: ${errorMessage(err)}`);
    log.debug(formatError(err));
    await runCleanup();
    process.exit(1);
  },
);

import { loadDotenv } from "../infra/dotenv.js";
import { errorMessage, formatError } from "../infra/errors.js";
import { startHttpServer } from "../infra/serve.js";
import {
  loadConfig,
  resolveServicesBaseUrl,
  resolveToolServerHost,
  resolveToolServerPort,
  resolveToolTimeout,
} from "../config/config.js";
import { applyLogLevel, createLogger } from "../logging.js";
import { createDefaultTools } from "./definitions.js";
import { createServicesClient } from "./services-client.js";
import { createToolServer } from "./server.js";

const log = createLogger("tool-server");

async function main(): Promise<void> {
  loadDotenv();
  applyLogLevel();
  const config = loadConfig();
  const services = createServicesClient({
    baseUrl: resolveServicesBaseUrl(config),
    timeoutMs: resolveToolTimeout(config),
  });
  const tools = createDefaultTools(services);
  const server = await startHttpServer(createToolServer({ tools }), {
    name: "Tool server",
    hostname: resolveToolServerHost(config),
    port: resolveToolServerPort(config),
  });
  log.info(`Serving ${tools.length} tools: ${tools.map((t) => t.name).join(", ")}`);

  const shutdown = () => {
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error(`Shutdown error: ${formatError(err)}`);
        process.exit(1);
      },
    );
  };
  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  log.fatal(`Fatal error: ${errorMessage(err)}`);
  log.debug(formatError(err));
  process.exit(1);
});

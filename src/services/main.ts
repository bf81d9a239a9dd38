import { loadDotenv } from "../infra/dotenv.js";
import { errorMessage, formatError } from "../infra/errors.js";
import { startHttpServer } from "../infra/serve.js";
import { loadConfig, resolveServicesHost, resolveServicesPort } from "../config/config.js";
import { applyLogLevel, createLogger } from "../logging.js";
import { createServicesApp } from "./app.js";

const log = createLogger("services");

async function main(): Promise<void> {
  loadDotenv();
  applyLogLevel();
  const config = loadConfig();
  const server = await startHttpServer(createServicesApp(), {
    name: "Mock services",
    hostname: resolveServicesHost(config),
    port: resolveServicesPort(config),
  });

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

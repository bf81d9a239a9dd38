import { config } from "dotenv";
import { resolve } from "node:path";
import { existsSync } from "node:fs";
import { createLogger } from "../logging.js";

const log = createLogger("dotenv");

/** Loads `.env` from `dir` (default cwd) when present. Returns whether a file was applied. */
export function loadDotenv(dir?: string): boolean {
  const envPath = resolve(dir ?? process.cwd(), ".env");
  if (!existsSync(envPath)) {
    return false;
  }
  const result = config({ path: envPath });
  if (result.error) {
    log.warn(`Failed to parse ${envPath}: ${result.error.message}`);
    return false;
  }
  log.debug(`Loaded environment from ${envPath}`);
  return true;
}

import { readFileSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../infra/errors.js";
import type { ConciergeConfig, LlmProvider, ToolProviderMode } from "./types.js";

const CONFIG_FILENAMES = [
  "concierge.config.yaml",
  "concierge.config.yml",
  "concierge.config.json",
];

const PROVIDERS: readonly LlmProvider[] = ["azure", "openai", "openrouter", "anthropic"];
const TOOL_MODES: readonly ToolProviderMode[] = ["local", "remote"];
const SECTIONS = ["agent", "tools", "services", "toolServer"] as const;

export const DEFAULT_TEMPERATURE = 0.3;
export const DEFAULT_MAX_TOOL_ROUNDS = 10;
export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;
export const DEFAULT_SERVICES_PORT = 8000;
export const DEFAULT_TOOL_SERVER_PORT = 8100;
const DEFAULT_HOST = "127.0.0.1";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function checkPort(value: unknown, key: string): void {
  if (value === undefined) {
    return;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value < 1 || value > 65535) {
    throw new ConfigError(`${key} must be an integer between 1 and 65535`);
  }
}

function checkString(value: unknown, key: string): void {
  if (value !== undefined && typeof value !== "string") {
    throw new ConfigError(`Config '${key}' must be a string`);
  }
}

function checkBoolean(value: unknown, key: string): void {
  if (value !== undefined && typeof value !== "boolean") {
    throw new ConfigError(`Config '${key}' must be a boolean`);
  }
}

function validateConfig(value: unknown): ConciergeConfig {
  if (value === null || value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError("Config must be an object");
  }
  for (const section of SECTIONS) {
    if (value[section] !== undefined && !isRecord(value[section])) {
      throw new ConfigError(`Config '${section}' must be an object`);
    }
  }

  const agent = isRecord(value.agent) ? value.agent : {};
  if (agent.provider !== undefined && !PROVIDERS.some((p) => p === agent.provider)) {
    throw new ConfigError(`agent.provider must be one of: ${PROVIDERS.join(", ")}`);
  }
  checkString(agent.model, "agent.model");
  checkString(agent.systemPrompt, "agent.systemPrompt");
  checkBoolean(agent.concurrentTools, "agent.concurrentTools");
  if ("maxTokens" in agent && (typeof agent.maxTokens !== "number" || agent.maxTokens < 1)) {
    throw new ConfigError("agent.maxTokens must be a positive number");
  }
  if ("temperature" in agent && (typeof agent.temperature !== "number" || agent.temperature < 0 || agent.temperature > 2)) {
    throw new ConfigError("agent.temperature must be between 0 and 2");
  }
  if (
    "maxToolRounds" in agent &&
    (typeof agent.maxToolRounds !== "number" || !Number.isInteger(agent.maxToolRounds) || agent.maxToolRounds < 1)
  ) {
    throw new ConfigError("agent.maxToolRounds must be a positive integer");
  }

  const tools = isRecord(value.tools) ? value.tools : {};
  if (tools.mode !== undefined && !TOOL_MODES.some((m) => m === tools.mode)) {
    throw new ConfigError(`tools.mode must be one of: ${TOOL_MODES.join(", ")}`);
  }
  checkString(tools.url, "tools.url");
  if ("timeoutMs" in tools && (typeof tools.timeoutMs !== "number" || tools.timeoutMs < 100)) {
    throw new ConfigError("tools.timeoutMs must be at least 100ms");
  }

  const services = isRecord(value.services) ? value.services : {};
  checkString(services.baseUrl, "services.baseUrl");
  checkString(services.host, "services.host");
  checkBoolean(services.embedded, "services.embedded");
  checkPort(services.port, "services.port");

  const toolServer = isRecord(value.toolServer) ? value.toolServer : {};
  checkString(toolServer.host, "toolServer.host");
  checkPort(toolServer.port, "toolServer.port");

  // Shape checked field by field above.
  return value as ConciergeConfig;
}

export function loadConfig(dir?: string): ConciergeConfig {
  const baseDir = dir ?? process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filepath = resolve(baseDir, filename);
    if (existsSync(filepath)) {
      let raw: string;
      try {
        raw = readFileSync(filepath, "utf-8");
      } catch (err) {
        throw new ConfigError(`Failed to read config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      let parsed: unknown;
      try {
        parsed = filename.endsWith(".json")
          ? JSON.parse(raw)
          : (parseYaml(raw) ?? {});
      } catch (err) {
        throw new ConfigError(`Failed to parse config file ${filepath}: ${err instanceof Error ? err.message : String(err)}`);
      }
      return validateConfig(parsed);
    }
  }

  return {};
}

export function resolveProvider(config: ConciergeConfig): LlmProvider {
  return config.agent?.provider ?? "azure";
}

export function resolveTemperature(config: ConciergeConfig): number {
  return config.agent?.temperature ?? DEFAULT_TEMPERATURE;
}

export function resolveMaxToolRounds(config: ConciergeConfig): number {
  return config.agent?.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
}

export function resolveToolTimeout(config: ConciergeConfig): number {
  return config.tools?.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS;
}

export function resolveServicesPort(config: ConciergeConfig): number {
  return config.services?.port ?? DEFAULT_SERVICES_PORT;
}

export function resolveServicesHost(config: ConciergeConfig): string {
  return config.services?.host ?? DEFAULT_HOST;
}

export function resolveServicesBaseUrl(config: ConciergeConfig): string {
  const url = config.services?.baseUrl ?? `http://${resolveServicesHost(config)}:${resolveServicesPort(config)}`;
  return url.replace(/\/+$/, "");
}

export function resolveToolServerPort(config: ConciergeConfig): number {
  return config.toolServer?.port ?? DEFAULT_TOOL_SERVER_PORT;
}

export function resolveToolServerHost(config: ConciergeConfig): string {
  return config.toolServer?.host ?? DEFAULT_HOST;
}

export function resolveToolServerUrl(config: ConciergeConfig): string {
  const url = config.tools?.url ?? `http://${resolveToolServerHost(config)}:${resolveToolServerPort(config)}`;
  return url.replace(/\/+$/, "");
}

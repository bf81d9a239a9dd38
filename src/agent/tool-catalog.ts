import { CatalogUnavailableError, errorMessage } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import type { ToolProvider } from "../tools/types.js";
import type { ToolDescriptor } from "./types.js";

const log = createLogger("tool-catalog");

export type ToolCatalog = {
  list: () => readonly ToolDescriptor[];
  get: (name: string) => ToolDescriptor | undefined;
  names: () => string[];
};

export function createToolCatalog(descriptors: readonly ToolDescriptor[]): ToolCatalog {
  const seen = new Set<string>();
  for (const d of descriptors) {
    if (seen.has(d.name)) {
      throw new CatalogUnavailableError(`Tool provider advertised "${d.name}" more than once`);
    }
    seen.add(d.name);
  }

  const frozen = Object.freeze(descriptors.map((d) => Object.freeze({ ...d })));
  const byName = new Map(frozen.map((d) => [d.name, d]));

  return {
    list: () => frozen,
    get: (name) => byName.get(name),
    names: () => frozen.map((d) => d.name),
  };
}

/** Fetches the tool list once. The agent cannot start without it. */
export async function loadToolCatalog(provider: ToolProvider): Promise<ToolCatalog> {
  let descriptors: ToolDescriptor[];
  try {
    descriptors = await provider.listTools();
  } catch (err) {
    throw new CatalogUnavailableError(`Could not load tools from the tool provider: ${errorMessage(err)}`, err);
  }
  const catalog = createToolCatalog(descriptors);
  log.info(`Loaded ${descriptors.length} tools: ${catalog.names().join(", ")}`);
  return catalog;
}

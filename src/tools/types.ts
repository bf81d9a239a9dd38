import type { ToolArguments, ToolDescriptor } from "../agent/types.js";
import type { SessionContext } from "./session-context.js";

/**
 * Boundary to whatever hosts the tools. The agent only needs these two
 * operations and knows nothing about how a tool is implemented.
 */
export type ToolProvider = {
  listTools: () => Promise<ToolDescriptor[]>;
  /** Resolves with the tool's text output; rejects on any provider-side failure. */
  callTool: (name: string, args: ToolArguments, session: SessionContext) => Promise<string>;
  close?: () => Promise<void>;
};

export type ToolDefinition = ToolDescriptor & {
  execute: (args: ToolArguments, session: SessionContext) => Promise<string>;
};

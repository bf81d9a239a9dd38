import { createInterface } from "node:readline";
import type { AgentEvent, AgentLoop } from "../agent/agent-loop.js";
import { formatArguments, preview } from "../utils.js";

const RULE = "=".repeat(60);
const RESULT_PREVIEW_LENGTH = 200;

export type ReplOptions = {
  loop: AgentLoop;
  toolNames: readonly string[];
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Source of SIGINT; the first one ends the session. Defaults to `process`. */
  signals?: NodeJS.EventEmitter;
};

export function formatBanner(toolNames: readonly string[]): string {
  return [
    RULE,
    "  Concierge - Multi-Domain AI Assistant",
    `  Available tools: ${toolNames.join(", ")}`,
    RULE,
    "",
    "Type your request (or 'quit' to exit):",
    "",
  ].join("\n");
}

export function formatEvent(event: AgentEvent): string {
  switch (event.type) {
    case "tool_call":
      return `\n  [Tool Call] ${event.call.toolName}(${formatArguments(event.call.arguments)})`;
    case "tool_result":
      return `  [Result] ${preview(event.result.content, RESULT_PREVIEW_LENGTH)}`;
    case "answer":
      return `\nAgent: ${event.text}\n`;
    case "error":
      return `\n[Error] ${event.message}\n`;
  }
}

/** Line-oriented chat on stdin/stdout until quit or end of input. */
export async function runRepl(options: ReplOptions): Promise<void> {
  const output = options.output ?? process.stdout;
  const rl = createInterface({
    input: options.input ?? process.stdin,
    output,
    terminal: false,
  });
  rl.setPrompt("You: ");
  // Without a terminal, readline never sees Ctrl-C itself
  const signals = options.signals ?? process;
  const onInterrupt = () => rl.close();
  signals.once("SIGINT", onInterrupt);

  const writeLine = (text: string) => {
    output.write(`${text}\n`);
  };

  writeLine(formatBanner(options.toolNames));
  const unsubscribe = options.loop.subscribe((event) => writeLine(formatEvent(event)));

  try {
    await options.loop.run(rl, { awaitingInput: () => rl.prompt() });
  } finally {
    signals.off("SIGINT", onInterrupt);
    unsubscribe();
    rl.close();
  }
  writeLine("\nGoodbye!");
}

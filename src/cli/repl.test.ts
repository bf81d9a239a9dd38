import { describe, it, expect } from "vitest";
import { EventEmitter } from "node:events";
import { PassThrough, Writable } from "node:stream";
import { formatBanner, formatEvent, runRepl } from "./repl.js";
import { AgentLoop } from "../agent/agent-loop.js";
import { createToolCatalog } from "../agent/tool-catalog.js";
import { createToolInvoker } from "../agent/tool-invoker.js";
import { Transcript } from "../agent/transcript.js";
import { SessionContext } from "../tools/session-context.js";
import type { ReasoningClient } from "../agent/reasoning-client.js";
import type { Decision } from "../agent/types.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function collect(): { stream: Writable; text: () => string } {
  let buffer = "";
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      buffer += chunk.toString();
      callback();
    },
  });
  return { stream, text: () => buffer };
}

function makeLoop(decisions: Decision[]): AgentLoop {
  const catalog = createToolCatalog([
    { name: "get_weather", description: "Weather", parameterSchema: { type: "object" } },
  ]);
  const reasoning: ReasoningClient = {
    complete: async () => decisions.shift() ?? { kind: "final", text: "(no more)" },
  };
  const invoker = createToolInvoker({
    catalog,
    provider: { listTools: async () => [], callTool: async () => "Weather in Oslo: cold" },
    session: new SessionContext(),
  });
  return new AgentLoop({ transcript: new Transcript("sys"), catalog, reasoning, invoker, maxToolRounds: 3 });
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

describe("formatBanner", () => {
  it("lists the tools between rules", () => {
    const rule = "=".repeat(60);
    expect(formatBanner(["get_weather", "member_lookup"])).toBe(
      `${rule}\n  Concierge - Multi-Domain AI Assistant\n  Available tools: get_weather, member_lookup\n${rule}\n\nType your request (or 'quit' to exit):\n`,
    );
  });
});

describe("formatEvent", () => {
  it("formats tool calls with their arguments", () => {
    expect(
      formatEvent({
        type: "tool_call",
        call: { id: "c1", toolName: "convert_currency", arguments: { from_currency: "USD", amount: 100 } },
      }),
    ).toBe('\n  [Tool Call] convert_currency(from_currency="USD", amount=100)');
  });

  it("previews long results", () => {
    const content = "x".repeat(250);
    expect(
      formatEvent({
        type: "tool_result",
        result: { call: { id: "c1", toolName: "t", arguments: {} }, content, isError: false },
      }),
    ).toBe(`  [Result] ${"x".repeat(200)}...`);
  });

  it("formats answers and errors", () => {
    expect(formatEvent({ type: "answer", text: "Done." })).toBe("\nAgent: Done.\n");
    expect(formatEvent({ type: "error", message: "Sorry." })).toBe("\n[Error] Sorry.\n");
  });
});

// ---------------------------------------------------------------------------
// runRepl
// ---------------------------------------------------------------------------

describe("runRepl", () => {
  it("chats until quit and says goodbye", async () => {
    const input = new PassThrough();
    const output = collect();
    const loop = makeLoop([
      { kind: "tool_requests", calls: [{ id: "c1", toolName: "get_weather", arguments: { location: "Oslo" } }] },
      { kind: "final", text: "It's cold in Oslo." },
    ]);

    input.end("weather in Oslo?\nquit\nignored\n");
    await runRepl({ loop, toolNames: ["get_weather"], input, output: output.stream });

    expect(output.text()).toBe(
      [
        `${formatBanner(["get_weather"])}\n`,
        "You: ",
        '\n  [Tool Call] get_weather(location="Oslo")\n',
        "  [Result] Weather in Oslo: cold\n",
        "\nAgent: It's cold in Oslo.\n\n",
        "You: ",
        "\nGoodbye!\n",
      ].join(""),
    );
    expect(loop.state).toBe("Terminating");
  });

  it("ends at end of input", async () => {
    const input = new PassThrough();
    const output = collect();
    const loop = makeLoop([]);

    input.end();
    await runRepl({ loop, toolNames: [], input, output: output.stream });

    expect(output.text().endsWith("You: \nGoodbye!\n")).toBe(true);
    expect(loop.state).toBe("Terminating");
  });

  it("says goodbye on Ctrl-C at the prompt", async () => {
    const input = new PassThrough();
    const output = collect();
    const signals = new EventEmitter();
    const loop = makeLoop([]);

    const done = runRepl({ loop, toolNames: [], input, output: output.stream, signals });
    signals.emit("SIGINT");
    await done;

    expect(output.text()).toBe(`${formatBanner([])}\nYou: \nGoodbye!\n`);
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(loop.state).toBe("Terminating");
  });
});

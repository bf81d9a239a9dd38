import { ReasoningUnavailableError } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import type { ReasoningClient } from "./reasoning-client.js";
import type { ToolCatalog } from "./tool-catalog.js";
import type { ToolInvocationResult, ToolInvoker } from "./tool-invoker.js";
import type { Transcript } from "./transcript.js";
import type { AgentState, ToolCallRequest } from "./types.js";

const log = createLogger("agent-loop");

const QUIT_KEYWORDS = new Set(["quit", "exit", "q"]);

export const COULD_NOT_COMPLETE_MESSAGE =
  "I could not complete this request within the allowed number of tool steps. Please try rephrasing or breaking it into smaller requests.";

export const EMPTY_ANSWER_MESSAGE =
  "Sorry, I didn't get a response to that. Please try again or rephrase your request.";

export type AgentEvent =
  | { type: "tool_call"; call: ToolCallRequest }
  | { type: "tool_result"; result: ToolInvocationResult }
  | { type: "answer"; text: string }
  | { type: "error"; message: string };

export type AgentEventListener = (event: AgentEvent) => void;

export type TurnResult =
  | { kind: "answer"; text: string; rounds: number; limited: boolean }
  | { kind: "error"; message: string }
  | { kind: "ignored" }
  | { kind: "quit" };

export type AgentLoopOptions = {
  transcript: Transcript;
  catalog: ToolCatalog;
  reasoning: ReasoningClient;
  invoker: ToolInvoker;
  /** Tool rounds allowed per user turn before a final answer is forced. */
  maxToolRounds: number;
  concurrentTools?: boolean;
};

export function isQuitCommand(input: string): boolean {
  return QUIT_KEYWORDS.has(input.trim().toLowerCase());
}

/**
 * Drives one conversation: user input, then alternating reasoning and tool
 * execution until the model answers. Strictly sequential; one reasoning or
 * tool batch is in flight at a time.
 */
export class AgentLoop {
  private currentState: AgentState = "AwaitingUserInput";
  private readonly listeners = new Set<AgentEventListener>();
  private readonly transcript: Transcript;
  private readonly catalog: ToolCatalog;
  private readonly reasoning: ReasoningClient;
  private readonly invoker: ToolInvoker;
  private readonly maxToolRounds: number;
  private readonly concurrentTools: boolean;

  constructor(options: AgentLoopOptions) {
    if (!Number.isInteger(options.maxToolRounds) || options.maxToolRounds < 1) {
      throw new RangeError("maxToolRounds must be a positive integer");
    }
    this.transcript = options.transcript;
    this.catalog = options.catalog;
    this.reasoning = options.reasoning;
    this.invoker = options.invoker;
    this.maxToolRounds = options.maxToolRounds;
    this.concurrentTools = options.concurrentTools ?? false;
  }

  get state(): AgentState {
    return this.currentState;
  }

  subscribe(listener: AgentEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async runTurn(input: string): Promise<TurnResult> {
    if (this.currentState === "Terminating") {
      return { kind: "quit" };
    }
    if (this.currentState !== "AwaitingUserInput") {
      throw new Error(`Cannot start a turn while ${this.currentState}`);
    }

    const text = input.trim();
    if (text.length === 0) {
      return { kind: "ignored" };
    }
    if (isQuitCommand(text)) {
      this.terminate();
      return { kind: "quit" };
    }

    this.transcript.appendUser(text);
    try {
      return await this.reason();
    } catch (err) {
      if (err instanceof ReasoningUnavailableError) {
        log.error(`Reasoning service failed: ${err.message}`);
        const message = `Sorry, I couldn't reach the reasoning service (${err.message}). Please try again.`;
        this.emit({ type: "error", message });
        return { kind: "error", message };
      }
      throw err;
    } finally {
      this.currentState = "AwaitingUserInput";
    }
  }

  /** Runs turns until a quit keyword or the end of `lines`. */
  async run(lines: AsyncIterable<string>, hooks?: { awaitingInput?: () => void }): Promise<void> {
    hooks?.awaitingInput?.();
    for await (const line of lines) {
      const result = await this.runTurn(line);
      if (result.kind === "quit") {
        return;
      }
      hooks?.awaitingInput?.();
    }
    this.terminate();
  }

  terminate(): void {
    this.currentState = "Terminating";
  }

  private async reason(): Promise<TurnResult> {
    let rounds = 0;
    for (;;) {
      this.currentState = "Reasoning";
      const decision = await this.reasoning.complete(this.transcript, this.catalog);

      if (decision.kind === "final") {
        if (decision.text.trim().length === 0) {
          log.warn("Model returned an empty answer");
          return this.answer(EMPTY_ANSWER_MESSAGE, rounds, false);
        }
        return this.answer(decision.text, rounds, false);
      }

      if (rounds >= this.maxToolRounds) {
        log.warn(`Tool round limit (${this.maxToolRounds}) reached; forcing a final answer`);
        return this.forceAnswer(rounds);
      }

      this.transcript.appendAssistantToolCalls(decision.calls);
      await this.executeTools(decision.calls);
      rounds++;
    }
  }

  private async executeTools(calls: readonly ToolCallRequest[]): Promise<void> {
    this.currentState = "ExecutingTools";
    const results = await this.invoker.invokeBatch(calls, {
      concurrent: this.concurrentTools,
      onStart: (call) => this.emit({ type: "tool_call", call }),
      onResult: (result) => this.emit({ type: "tool_result", result }),
    });
    for (const result of results) {
      this.transcript.appendToolResult(result.call.id, result.content);
    }
  }

  private async forceAnswer(rounds: number): Promise<TurnResult> {
    this.currentState = "Reasoning";
    let text = COULD_NOT_COMPLETE_MESSAGE;
    try {
      const decision = await this.reasoning.complete(this.transcript, this.catalog, { withoutTools: true });
      if (decision.kind === "final" && decision.text.trim().length > 0) {
        text = decision.text;
      }
    } catch (err) {
      if (!(err instanceof ReasoningUnavailableError)) {
        throw err;
      }
      log.warn(`Forced final answer failed: ${err.message}`);
    }
    return this.answer(text, rounds, true);
  }

  private answer(text: string, rounds: number, limited: boolean): TurnResult {
    this.transcript.appendAssistantText(text);
    this.emit({ type: "answer", text });
    return { kind: "answer", text, rounds, limited };
  }

  private emit(event: AgentEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

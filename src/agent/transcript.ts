import { TranscriptError } from "../infra/errors.js";
import type { AssistantToolCallMessage, Message, ToolCallRequest } from "./types.js";

/**
 * Append-only conversation log. It is the only state sent to the model.
 *
 * Tool messages must answer a call of the most recent assistant tool-call
 * message, each call exactly once, before any further user or assistant
 * message is appended.
 */
export class Transcript {
  private readonly entries: Message[] = [];
  private pendingCall: AssistantToolCallMessage | null = null;
  private readonly answered = new Set<string>();

  constructor(systemPrompt?: string) {
    if (systemPrompt !== undefined) {
      this.appendSystem(systemPrompt);
    }
  }

  get length(): number {
    return this.entries.length;
  }

  messages(): readonly Message[] {
    return [...this.entries];
  }

  last(): Message | undefined {
    return this.entries[this.entries.length - 1];
  }

  /** Ids of the latest tool-call batch that have no tool message yet. */
  unansweredCallIds(): string[] {
    if (!this.pendingCall) {
      return [];
    }
    return this.pendingCall.toolCalls.map((c) => c.id).filter((id) => !this.answered.has(id));
  }

  appendSystem(content: string): void {
    this.ensureSettled("system");
    this.push({ role: "system", content });
  }

  appendUser(content: string): void {
    this.ensureSettled("user");
    this.push({ role: "user", content });
  }

  appendAssistantText(content: string): void {
    this.ensureSettled("assistant");
    this.push({ role: "assistant", content });
  }

  appendAssistantToolCalls(calls: readonly ToolCallRequest[]): void {
    this.ensureSettled("assistant");
    if (calls.length === 0) {
      throw new TranscriptError("An assistant tool-call message needs at least one call");
    }
    const ids = new Set(calls.map((c) => c.id));
    if (ids.size !== calls.length) {
      throw new TranscriptError("Tool call ids must be unique within a turn");
    }
    const message: AssistantToolCallMessage = {
      role: "assistant",
      content: null,
      toolCalls: Object.freeze(calls.map((c) => Object.freeze({ ...c }))),
    };
    this.push(message);
    this.pendingCall = message;
    this.answered.clear();
  }

  appendToolResult(toolCallId: string, content: string): void {
    if (!this.pendingCall || !this.pendingCall.toolCalls.some((c) => c.id === toolCallId)) {
      throw new TranscriptError(`Tool result ${toolCallId} does not answer the latest tool-call message`);
    }
    if (this.answered.has(toolCallId)) {
      throw new TranscriptError(`Tool call ${toolCallId} already has a result`);
    }
    this.answered.add(toolCallId);
    this.push({ role: "tool", toolCallId, content });
  }

  private ensureSettled(role: Message["role"]): void {
    const open = this.unansweredCallIds();
    if (open.length > 0) {
      throw new TranscriptError(
        `Cannot append a ${role} message while tool calls are unanswered: ${open.join(", ")}`,
      );
    }
  }

  private push(message: Message): void {
    if (message.role !== "tool") {
      this.pendingCall = null;
      this.answered.clear();
    }
    this.entries.push(Object.freeze(message));
  }
}

import crypto from "node:crypto";

export type SessionValue = string | number | boolean;

/**
 * Key/value state produced by tool calls (e.g. the last member looked up)
 * and visible to later tool calls of the same conversation. Lives for the
 * process only.
 */
export class SessionContext {
  readonly id: string;
  private readonly values = new Map<string, SessionValue>();

  constructor(id: string = crypto.randomUUID()) {
    this.id = id;
  }

  get(key: string): SessionValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: SessionValue): void {
    this.values.set(key, value);
  }

  entries(): Array<[string, SessionValue]> {
    return [...this.values.entries()];
  }

  isEmpty(): boolean {
    return this.values.size === 0;
  }
}

export const EMPTY_SESSION_CONTEXT = "No session context available. Use member_lookup first.";

export function formatSessionContext(session: SessionContext): string {
  if (session.isEmpty()) {
    return EMPTY_SESSION_CONTEXT;
  }
  const lines = ["Current Session Context:"];
  for (const [key, value] of session.entries()) {
    lines.push(`  ${key}: ${value}`);
  }
  return lines.join("\n");
}

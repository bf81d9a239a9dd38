import type { ConciergeConfig } from "../config/types.js";

const BASE_SYSTEM_PROMPT = `You are Concierge, a helpful multi-domain personal assistant.
You have access to tools for weather, currency conversion, member lookup,
flight search/booking, and movie search/booking.`;

const REASONING_INSTRUCTIONS = `IMPORTANT REASONING INSTRUCTIONS:
1. Break down complex requests into sequential steps.
2. Always look up the member first if an email is provided; you need the member_id for bookings.
3. Execute tool calls one domain at a time, then synthesize all results into a final natural-language response.
4. When presenting options (flights, movies), format them clearly and ask before booking unless the user explicitly asks you to book.
5. Think step by step and explain your reasoning.`;

/** YYYY-MM-DD in local time. */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, "0");
  const d = String(date.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

export function buildSystemPrompt(params: {
  config: ConciergeConfig;
  now?: Date;
  toolNames?: readonly string[];
}): string {
  const now = params.now ?? new Date();
  const tomorrow = new Date(now.getFullYear(), now.getMonth(), now.getDate() + 1);
  const parts: string[] = [];

  parts.push(params.config.agent?.systemPrompt ?? BASE_SYSTEM_PROMPT);

  parts.push(
    `\nToday's date is ${formatDate(now)}.\nTomorrow's date is ${formatDate(tomorrow)}.\n` +
      `When a user mentions "tomorrow", use tomorrow's date in YYYY-MM-DD format.`,
  );

  if (params.toolNames && params.toolNames.length > 0) {
    parts.push(`\nAvailable tools: ${params.toolNames.join(", ")}`);
  }

  parts.push("\n" + REASONING_INSTRUCTIONS);

  return parts.join("\n");
}

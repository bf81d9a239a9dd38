import { z } from "zod";
import { HttpError, fetchJson } from "../infra/http.js";
import type { ToolProvider } from "./types.js";

const ToolListSchema = z.object({
  tools: z.array(
    z.object({
      name: z.string(),
      description: z.string().default(""),
      parameterSchema: z.record(z.unknown()).default({ type: "object", properties: {} }),
    }),
  ),
});

const CallResultSchema = z.object({ content: z.string() });
const ErrorBodySchema = z.object({ error: z.string() });

export type HttpToolProviderOptions = {
  url: string;
  timeoutMs?: number;
};

function describeHttpError(err: HttpError): Error {
  let body: unknown;
  try {
    body = JSON.parse(err.body);
  } catch {
    return err;
  }
  const parsed = ErrorBodySchema.safeParse(body);
  return parsed.success ? new Error(`${parsed.data.error} (HTTP ${err.status})`) : err;
}

/** Talks to a tool server started with `createToolServer`. */
export function createHttpToolProvider(options: HttpToolProviderOptions): ToolProvider {
  const baseUrl = options.url.replace(/\/+$/, "");

  return {
    async listTools() {
      const body = await fetchJson(`${baseUrl}/tools`, { timeoutMs: options.timeoutMs });
      return ToolListSchema.parse(body).tools;
    },
    async callTool(name, args, session) {
      let body: unknown;
      try {
        body = await fetchJson(`${baseUrl}/tools/call`, {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ name, arguments: args, sessionId: session.id }),
          timeoutMs: options.timeoutMs,
        });
      } catch (err) {
        throw err instanceof HttpError ? describeHttpError(err) : err;
      }
      const parsed = CallResultSchema.safeParse(body);
      if (!parsed.success) {
        throw new Error(`Tool server returned an unexpected body for ${name}`);
      }
      return parsed.data.content;
    },
  };
}

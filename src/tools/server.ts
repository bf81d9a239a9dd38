import { Hono } from "hono";
import { z } from "zod";
import { ToolArgumentError, errorMessage } from "../infra/errors.js";
import { createLogger } from "../logging.js";
import { SessionContext, formatSessionContext } from "./session-context.js";
import type { ToolDefinition } from "./types.js";
import { toDescriptor } from "./local-provider.js";

const log = createLogger("tool-server");

const DEFAULT_MAX_SESSIONS = 1000;

const CallBodySchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
  sessionId: z.string().min(1).max(128),
});

export type ToolServerDeps = {
  tools: readonly ToolDefinition[];
  /** Session store; one context per conversation id. */
  sessions?: Map<string, SessionContext>;
  /** Least recently used sessions are dropped beyond this count. */
  maxSessions?: number;
};

/**
 * Tool-provider protocol over HTTP:
 *   GET  /tools                      -> { tools }
 *   POST /tools/call                 -> { content } | { error }
 *   GET  /sessions/:id/context       -> { sessionId, context, text }
 */
export function createToolServer(deps: ToolServerDeps): Hono {
  const app = new Hono();
  const byName = new Map(deps.tools.map((t) => [t.name, t]));
  const sessions = deps.sessions ?? new Map<string, SessionContext>();
  const maxSessions = deps.maxSessions ?? DEFAULT_MAX_SESSIONS;
  if (!Number.isInteger(maxSessions) || maxSessions < 1) {
    throw new RangeError("maxSessions must be a positive integer");
  }

  function sessionFor(id: string): SessionContext {
    const session = sessions.get(id) ?? new SessionContext(id);
    // Delete and re-insert to keep the Map in LRU order
    sessions.delete(id);
    sessions.set(id, session);
    while (sessions.size > maxSessions) {
      const oldest = sessions.keys().next().value;
      if (oldest === undefined) {
        break;
      }
      sessions.delete(oldest);
      log.debug(`Evicted session ${oldest}`);
    }
    return session;
  }

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/tools", (c) => c.json({ tools: deps.tools.map(toDescriptor) }));

  app.post("/tools/call", async (c) => {
    let raw: unknown;
    try {
      raw = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }
    const body = CallBodySchema.safeParse(raw);
    if (!body.success) {
      return c.json({ error: "Body must be { name, arguments, sessionId }" }, 400);
    }

    const { name, arguments: args, sessionId } = body.data;
    const tool = byName.get(name);
    if (!tool) {
      return c.json({ error: `Unknown tool: ${name}` }, 404);
    }

    try {
      const content = await tool.execute(args, sessionFor(sessionId));
      return c.json({ content });
    } catch (err) {
      if (err instanceof ToolArgumentError) {
        return c.json({ error: err.message }, 400);
      }
      log.warn(`${name} failed: ${errorMessage(err)}`);
      return c.json({ error: errorMessage(err) }, 502);
    }
  });

  app.get("/sessions/:id/context", (c) => {
    const id = c.req.param("id");
    const session = sessions.get(id) ?? new SessionContext(id);
    return c.json({
      sessionId: id,
      context: Object.fromEntries(session.entries()),
      text: formatSessionContext(session),
    });
  });

  return app;
}

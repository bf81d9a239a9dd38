export type FetchJsonInit = RequestInit & { timeoutMs?: number };

const DEFAULT_TIMEOUT_MS = 10_000;

export class HttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(body ? `HTTP ${status}: ${body}` : `HTTP ${status}`);
    this.name = "HttpError";
    this.status = status;
    this.body = body;
  }
}

function looksLikeTimeout(err: unknown): boolean {
  const msg = String(err).toLowerCase();
  return msg.includes("timeout") || msg.includes("timed out") || msg.includes("abort");
}

/**
 * fetch + JSON decode with a deadline. Non-2xx responses reject with an
 * HttpError carrying the status and response body.
 */
export async function fetchJson(url: string, init?: FetchJsonInit): Promise<unknown> {
  const { timeoutMs = DEFAULT_TIMEOUT_MS, ...requestInit } = init ?? {};
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const res = await fetch(url, { ...requestInit, signal: ctrl.signal });
    if (!res.ok) {
      const text = await res.text().catch(() => "");
      throw new HttpError(res.status, text);
    }
    return await res.json();
  } catch (err) {
    if (!(err instanceof HttpError) && looksLikeTimeout(err)) {
      throw new Error(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: err });
    }
    throw err;
  } finally {
    clearTimeout(t);
  }
}

export function withQuery(baseUrl: string, path: string, query: Record<string, string | number>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    params.set(key, String(value));
  }
  const qs = params.toString();
  return `${baseUrl}${path}${qs ? `?${qs}` : ""}`;
}

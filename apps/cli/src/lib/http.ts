/**
 * HTTP helpers: thin wrappers around native fetch for the relay.
 *
 * Relay errors arrive as { error, detail, ...details }; they surface as
 * RelayError so commands can print the code and detail.
 */

/** Timeout for each request (ms). */
const FETCH_TIMEOUT_MS = 30_000;

export class RelayError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    detail: string,
  ) {
    super(`${code} (${status}): ${detail}`);
    this.name = "RelayError";
  }
}

function field(body: unknown, key: string): string | undefined {
  if (typeof body !== "object" || body === null || !(key in body)) return undefined;
  const value: unknown = Reflect.get(body, key);
  return typeof value === "string" ? value : undefined;
}

async function parseResponse(method: string, url: string, res: Response): Promise<unknown> {
  const text = await res.text();
  let body: unknown = null;
  try {
    body = text ? JSON.parse(text) : null;
  } catch {
    if (res.ok) throw new Error(`${method} ${url} → ${res.status}: invalid JSON`);
  }
  if (!res.ok) {
    throw new RelayError(res.status, field(body, "error") ?? "http_error", field(body, "detail") ?? text);
  }
  return body;
}

/** JSON GET request. Throws on non-2xx. */
export async function httpGet(url: string): Promise<unknown> {
  const res = await fetch(url, { signal: AbortSignal.timeout(FETCH_TIMEOUT_MS) });
  return parseResponse("GET", url, res);
}

/** JSON POST request. Throws on non-2xx. */
export async function httpPost(url: string, body: unknown): Promise<unknown> {
  const res = await fetch(url, {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
    signal: AbortSignal.timeout(FETCH_TIMEOUT_MS),
  });
  return parseResponse("POST", url, res);
}

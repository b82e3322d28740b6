import { TransportError, errorMessage, truncate } from "../errors.js";
import { ProviderErrorBodySchema } from "../schemas.js";
import type { AdapterOutcome, AdapterSettings, FetchLike } from "./types.js";

export function resolveFetch(settings: AdapterSettings): FetchLike {
  return settings.fetch ?? globalThis.fetch;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`;
}

/**
 * fetch() that reports a missing response as TransportError. Aborts are
 * rethrown untouched so the caller can tell a timeout from a cancel.
 */
export async function request(
  fetchImpl: FetchLike,
  url: string,
  init: RequestInit & { signal: AbortSignal },
): Promise<Response> {
  try {
    return await fetchImpl(url, init);
  } catch (err) {
    if (init.signal.aborted) throw err;
    throw new TransportError(`request failed: ${errorMessage(err)}`, { cause: err });
  }
}

export function postJson(
  fetchImpl: FetchLike,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal,
): Promise<Response> {
  return request(fetchImpl, url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
    signal,
  });
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/** Provider error message when the body carries one, else the raw body. */
export async function readDiagnostic(response: Response, max: number): Promise<string> {
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    return truncate(`HTTP ${response.status} (${errorMessage(err)})`, max);
  }

  const parsed = ProviderErrorBodySchema.safeParse(parseJson(text));
  const message = parsed.success ? parsed.data.error.message : text.trim();

  return truncate(message.length > 0 ? message : `HTTP ${response.status}`, max);
}

export async function failedStatus(response: Response, max: number): Promise<AdapterOutcome> {
  const diagnostic = await readDiagnostic(response, max);
  const errorKind = response.status === 401 || response.status === 403 ? "authError" : "upstreamError";
  return { ok: false, errorKind, diagnostic };
}

/**
 * Parsed body, or undefined when it is not JSON. An abort while the body is
 * still streaming is rethrown so the deadline still reads as a timeout.
 */
export async function readJson(response: Response, signal: AbortSignal): Promise<unknown> {
  try {
    return await response.json();
  } catch (err) {
    if (signal.aborted) throw err;
    return undefined;
  }
}

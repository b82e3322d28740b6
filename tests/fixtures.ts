import { initLogger, type LoggerBackend } from "../src/logger.js";
import { createMemoryRecord } from "../src/memory.js";
import type { FetchLike } from "../src/providers/types.js";
import type { MemoryRecord } from "../src/types.js";

export interface CapturedLogs {
  info: string[];
  warn: string[];
  error: string[];
  debug: string[];
}

export function captureLogs(debug = false): CapturedLogs {
  const logs: CapturedLogs = { info: [], warn: [], error: [], debug: [] };
  const backend: LoggerBackend = {
    info(msg: string) {
      logs.info.push(msg);
    },
    warn(msg: string) {
      logs.warn.push(msg);
    },
    error(msg: string) {
      logs.error.push(msg);
    },
    debug(msg: string) {
      logs.debug.push(msg);
    },
  };
  initLogger(backend, debug);
  return logs;
}

export function makeMemory(fields: {
  id: string;
  title: string;
  content: string;
  workspaceId?: string;
  createdAt?: string;
}): MemoryRecord {
  return createMemoryRecord(
    {
      workspaceId: fields.workspaceId ?? "ws-1",
      title: fields.title,
      content: fields.content,
      tags: [],
      metadata: {},
    },
    new Date(fields.createdAt ?? "2024-01-01T00:00:00.000Z"),
    fields.id,
  );
}

export function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export interface RecordedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: unknown;
}

function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/**
 * fetch stand-in that records each request and answers from `handler`.
 */
export function stubFetch(
  handler: (req: RecordedRequest, signal: AbortSignal | undefined) => Response | Promise<Response>,
): { fetch: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    const raw = init?.body;
    const req: RecordedRequest = {
      url: requestUrl(input),
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: typeof raw === "string" ? JSON.parse(raw) : undefined,
    };
    requests.push(req);
    return handler(req, init?.signal ?? undefined);
  };
  return { fetch, requests };
}

/** Resolves never; rejects with the signal's reason once it aborts. */
export function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise((_, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * 200 response whose JSON body stalls after the first chunk and errors once
 * the request signal aborts.
 */
export function stalledJsonResponse(signal: AbortSignal | undefined): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"content": ['));
      signal?.addEventListener("abort", () => controller.error(signal.reason), { once: true });
    },
  });
  return new Response(body, { status: 200, headers: { "content-type": "application/json" } });
}

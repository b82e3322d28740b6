import test from "node:test";
import assert from "node:assert/strict";
import { parseConfig } from "../src/config.js";
import { DispatchExecutor, type DispatchExecutorOptions, type DispatchTransition } from "../src/dispatch.js";
import { TransportError } from "../src/errors.js";
import { echoReply } from "../src/providers/echo.js";
import { AdapterRegistry, createDefaultAdapters } from "../src/providers/registry.js";
import type { AdapterCall, AdapterOutcome, ProviderAdapter } from "../src/providers/types.js";
import type { ConnectionTestResult, ContextBundle, ProviderId } from "../src/types.js";
import { captureLogs, jsonResponse, stalledJsonResponse, stubFetch, waitForAbort } from "./fixtures.js";

const bundle: ContextBundle = { system: "SYS", memories: [], history: [], userMessage: "remember I love dark mode" };

class StubAdapter implements ProviderAdapter {
  readonly requiresCredential = true;
  readonly defaultTimeoutMs: number;
  calls: AdapterCall[] = [];

  constructor(
    readonly provider: ProviderId,
    private readonly behaviour: (call: AdapterCall) => Promise<AdapterOutcome>,
    private readonly probeBehaviour: (signal: AbortSignal) => Promise<ConnectionTestResult> = async () => ({
      success: true,
    }),
    defaultTimeoutMs = 5000,
  ) {
    this.defaultTimeoutMs = defaultTimeoutMs;
  }

  send(call: AdapterCall): Promise<AdapterOutcome> {
    this.calls.push(call);
    return this.behaviour(call);
  }

  probe(_credential: string, signal: AbortSignal): Promise<ConnectionTestResult> {
    return this.probeBehaviour(signal);
  }
}

function executorWith(adapter: ProviderAdapter, options: DispatchExecutorOptions = {}): DispatchExecutor {
  return new DispatchExecutor(new AdapterRegistry([adapter]), options);
}

test("a missing credential fails with authError and never calls the provider", async () => {
  captureLogs();
  const { fetch, requests } = stubFetch(() => jsonResponse(200, {}));
  const executor = new DispatchExecutor(createDefaultAdapters(parseConfig({}), fetch));

  for (const credential of [undefined, "", "   "]) {
    const result = await executor.dispatch({ provider: "openai", model: "gpt-4o" }, bundle, credential);
    assert.deepEqual(result, {
      status: "failed",
      reply: "[OPENAI Error] No API key provided",
      provider: "openai",
      canonicalModel: "gpt-4o",
      modelUsed: "gpt-4o",
      tokenUsage: 0,
      errorKind: "authError",
      diagnostic: "No API key provided",
    });
  }
  assert.equal(requests.length, 0);
});

test("echo succeeds without a credential", async () => {
  captureLogs();
  const executor = new DispatchExecutor(new AdapterRegistry());
  const result = await executor.dispatch({ provider: "echo", model: "mystery" }, bundle, undefined);

  assert.deepEqual(result, {
    status: "succeeded",
    reply: echoReply("remember I love dark mode"),
    provider: "echo",
    canonicalModel: "mystery",
    modelUsed: "mystery",
    tokenUsage: 5,
  });
});

test("a provider 500 through the openai adapter is an upstreamError carrying its message", async () => {
  captureLogs();
  const { fetch } = stubFetch(() => jsonResponse(500, { error: { message: "boom" } }));
  const executor = new DispatchExecutor(createDefaultAdapters(parseConfig({}), fetch));
  const result = await executor.dispatch({ provider: "openai", model: "gpt-4o" }, bundle, "test-secret");

  assert.equal(result.status, "failed");
  assert.equal(result.errorKind, "upstreamError");
  assert.match(result.diagnostic ?? "", /boom/);
  assert.equal(result.reply, `[OPENAI Error] ${result.diagnostic}`);
  assert.equal(result.tokenUsage, 0);
});

test("an adapter that outlives its deadline fails with timeout", async () => {
  captureLogs();
  const adapter = new StubAdapter("anthropic", (call) => waitForAbort(call.signal));
  const result = await executorWith(adapter).dispatch(
    { provider: "anthropic", model: "claude-3-haiku" },
    bundle,
    "test-secret",
    { timeoutMs: 20 },
  );

  assert.equal(result.errorKind, "timeout");
  assert.equal(result.diagnostic, "Request timeout");
  assert.equal(adapter.calls[0]?.timeoutMs, 20);
});

test("the HTTP adapters time out on a hanging fetch", async () => {
  captureLogs();
  const { fetch } = stubFetch((_req, signal) => waitForAbort(signal));
  const executor = new DispatchExecutor(createDefaultAdapters(parseConfig({}), fetch));

  for (const target of [
    { provider: "openai", model: "gpt-4o" },
    { provider: "google", model: "gemini-1.5-pro" },
  ] as const) {
    const result = await executor.dispatch(target, bundle, "test-secret", { timeoutMs: 20 });
    assert.equal(result.errorKind, "timeout", target.provider);
  }
});

test("a deadline that fires while the body streams is a timeout", async () => {
  captureLogs();
  const { fetch } = stubFetch((_req, signal) => stalledJsonResponse(signal));
  const executor = new DispatchExecutor(createDefaultAdapters(parseConfig({}), fetch));

  for (const target of [
    { provider: "anthropic", model: "claude-3.5-sonnet" },
    { provider: "google", model: "gemini-1.5-pro" },
  ] as const) {
    const result = await executor.dispatch(target, bundle, "test-secret", { timeoutMs: 50 });
    assert.equal(result.status, "failed", target.provider);
    assert.equal(result.errorKind, "timeout", target.provider);
    assert.match(result.reply, /Request timeout/);
  }
});

test("caller cancellation is reported as a transport error", async () => {
  captureLogs();
  const adapter = new StubAdapter("anthropic", (call) => waitForAbort(call.signal));
  const executor = executorWith(adapter);

  const controller = new AbortController();
  setTimeout(() => controller.abort(), 10);
  const result = await executor.dispatch({ provider: "anthropic", model: "claude-3-haiku" }, bundle, "test-secret", {
    signal: controller.signal,
  });
  assert.equal(result.errorKind, "transportError");
  assert.equal(result.diagnostic, "Request cancelled by caller");

  const early = await executor.dispatch({ provider: "anthropic", model: "claude-3-haiku" }, bundle, "test-secret", {
    signal: AbortSignal.abort(),
  });
  assert.equal(early.diagnostic, "Request cancelled by caller");
});

test("a rejected connection is a transportError with the network message", async () => {
  captureLogs();
  const fetch = async (): Promise<Response> => {
    throw new Error("connect ECONNREFUSED 127.0.0.1:443");
  };
  const executor = new DispatchExecutor(createDefaultAdapters(parseConfig({}), fetch));
  const result = await executor.dispatch({ provider: "anthropic", model: "claude-3-haiku" }, bundle, "test-secret");

  assert.equal(result.errorKind, "transportError");
  assert.equal(result.diagnostic, "request failed: connect ECONNREFUSED 127.0.0.1:443");
  assert.equal(result.reply, "[ANTHROPIC Error] request failed: connect ECONNREFUSED 127.0.0.1:443");
});

test("unexpected adapter exceptions become internalError and are logged", async () => {
  const logs = captureLogs();
  const adapter = new StubAdapter("google", async () => {
    throw new RangeError("kaboom");
  });
  const result = await executorWith(adapter).dispatch({ provider: "google", model: "gemini-1.5-pro" }, bundle, "test-secret");

  assert.equal(result.errorKind, "internalError");
  assert.equal(result.diagnostic, "Unexpected error: kaboom");
  assert.equal(logs.error.length, 1);
});

test("TransportError thrown by an adapter keeps its message", async () => {
  captureLogs();
  const adapter = new StubAdapter("groq", async () => {
    throw new TransportError("socket hang up");
  });
  const result = await executorWith(adapter).dispatch({ provider: "groq", model: "gemma2-9b-it" }, bundle, "test-secret");
  assert.equal(result.errorKind, "transportError");
  assert.equal(result.diagnostic, "socket hang up");
});

test("diagnostics are truncated to the configured length", async () => {
  captureLogs();
  const adapter = new StubAdapter("deepseek", async () => ({
    ok: false,
    errorKind: "upstreamError",
    diagnostic: "x".repeat(50),
  }));
  const result = await executorWith(adapter, { maxDiagnosticChars: 10 }).dispatch(
    { provider: "deepseek", model: "deepseek-chat" },
    bundle,
    "test-secret",
  );
  assert.equal(result.diagnostic, "x".repeat(10));
  assert.equal(result.reply, `[DEEPSEEK Error] ${"x".repeat(10)}`);
});

test("successful replies report the provider's model and token usage", async () => {
  captureLogs();
  const adapter = new StubAdapter("openai", async () => ({
    ok: true,
    reply: "Sure.",
    modelUsed: "",
    tokenUsage: 9,
  }));
  const result = await executorWith(adapter).dispatch({ provider: "openai", model: "gpt-4o" }, bundle, " test-secret ");

  assert.deepEqual(result, {
    status: "succeeded",
    reply: "Sure.",
    provider: "openai",
    canonicalModel: "gpt-4o",
    modelUsed: "gpt-4o",
    tokenUsage: 9,
  });
  assert.equal(adapter.calls[0]?.credential, "test-secret");
});

test("the observer sees each state once, and its exceptions are contained", async () => {
  captureLogs();
  const seen: DispatchTransition[] = [];
  const adapter = new StubAdapter("openai", async () => ({ ok: true, reply: "ok", modelUsed: "gpt-4o", tokenUsage: 1 }));
  const executor = executorWith(adapter, {
    observer: (t) => {
      seen.push(t);
      throw new Error("observer bug");
    },
  });

  const ok = await executor.dispatch({ provider: "openai", model: "gpt-4o" }, bundle, "test-secret");
  const denied = await executor.dispatch({ provider: "openai", model: "gpt-4o" }, bundle, undefined);

  assert.equal(ok.status, "succeeded");
  assert.equal(denied.status, "failed");
  assert.deepEqual(
    seen.map((t) => [t.callId, t.state]),
    [
      [1, "not_started"],
      [1, "in_flight"],
      [1, "succeeded"],
      [2, "not_started"],
      [2, "failed"],
    ],
  );
  assert.equal(seen.at(-1)?.errorKind, "authError");
});

test("testConnection covers unknown providers, missing keys and timeouts", async () => {
  captureLogs();
  const hanging = new StubAdapter("anthropic", async () => ({ ok: true, reply: "", modelUsed: "", tokenUsage: 0 }), (signal) =>
    waitForAbort(signal),
  );
  const executor = executorWith(hanging, { connectionTestTimeoutMs: 20 });

  assert.deepEqual(await executor.testConnection("openai", "test-secret"), {
    success: false,
    error: "Unknown provider: openai",
  });
  assert.deepEqual(await executor.testConnection("anthropic", " "), {
    success: false,
    error: "No API key provided",
  });
  assert.deepEqual(await executor.testConnection("anthropic", "test-secret"), {
    success: false,
    error: "Connection timeout - API did not respond in time",
  });
  assert.deepEqual(await executor.testConnection("echo", undefined), { success: true });
});

test("testConnection passes through provider verdicts", async () => {
  captureLogs();
  const { fetch } = stubFetch(() => jsonResponse(401, { error: { message: "bad key" } }));
  const executor = new DispatchExecutor(createDefaultAdapters(parseConfig({}), fetch));
  assert.deepEqual(await executor.testConnection("anthropic", "test-secret"), {
    success: false,
    error: "Invalid API key",
  });

  const down = async (): Promise<Response> => {
    throw new Error("getaddrinfo ENOTFOUND");
  };
  const offline = new DispatchExecutor(createDefaultAdapters(parseConfig({}), down));
  assert.deepEqual(await offline.testConnection("google", "test-secret"), {
    success: false,
    error: "Connection error - unable to reach API",
  });
});

import { TransportError, errorMessage, truncate } from "./errors.js";
import { log } from "./logger.js";
import type { AdapterRegistry } from "./providers/registry.js";
import type { AdapterOutcome, ProviderAdapter } from "./providers/types.js";
import type {
  ConnectionTestResult,
  ContextBundle,
  DispatchErrorKind,
  DispatchResult,
  DispatchState,
  ProviderId,
  ResolvedModel,
} from "./types.js";

export interface DispatchTransition {
  callId: number;
  state: DispatchState;
  provider: ProviderId;
  model: string;
  errorKind?: DispatchErrorKind;
}

export interface DispatchExecutorOptions {
  maxDiagnosticChars?: number;
  connectionTestTimeoutMs?: number;
  /** Sees every state change of every call. Exceptions it throws are logged and ignored. */
  observer?: (transition: DispatchTransition) => void;
}

export interface DispatchCallOptions {
  /** Overrides the adapter's default timeout. */
  timeoutMs?: number;
  /** Caller-side cancellation. */
  signal?: AbortSignal;
}

type AbortReason = "timeout" | "cancelled";

export function failedResult(
  target: ResolvedModel,
  errorKind: DispatchErrorKind,
  diagnostic: string,
  maxDiagnosticChars: number,
): DispatchResult {
  const clipped = truncate(diagnostic, maxDiagnosticChars);
  return {
    status: "failed",
    reply: `[${target.provider.toUpperCase()} Error] ${clipped}`,
    provider: target.provider,
    canonicalModel: target.model,
    modelUsed: target.model,
    tokenUsage: 0,
    errorKind,
    diagnostic: clipped,
  };
}

/**
 * Tracks one attempt's abort controller, its timer and the caller's signal.
 */
class CallGuard {
  readonly controller = new AbortController();
  private reason: AbortReason | null = null;
  private readonly timer: ReturnType<typeof setTimeout>;
  private readonly external: AbortSignal | undefined;
  private readonly onExternalAbort = (): void => this.abort("cancelled");

  constructor(timeoutMs: number, external?: AbortSignal) {
    this.timer = setTimeout(() => this.abort("timeout"), timeoutMs);
    this.external = external;
    if (external?.aborted) this.abort("cancelled");
    else external?.addEventListener("abort", this.onExternalAbort, { once: true });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get abortReason(): AbortReason | null {
    return this.reason;
  }

  private abort(reason: AbortReason): void {
    if (this.reason) return;
    this.reason = reason;
    this.controller.abort(reason);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.external?.removeEventListener("abort", this.onExternalAbort);
  }
}

/**
 * Runs one provider call per dispatch: not_started → in_flight → succeeded | failed.
 * No retries. Every failure comes back as a DispatchResult; nothing is thrown.
 */
export class DispatchExecutor {
  private readonly adapters: AdapterRegistry;
  private readonly maxDiagnosticChars: number;
  private readonly connectionTestTimeoutMs: number;
  private readonly observer: DispatchExecutorOptions["observer"];
  private nextCallId = 1;

  constructor(adapters: AdapterRegistry, options: DispatchExecutorOptions = {}) {
    this.adapters = adapters;
    this.maxDiagnosticChars = options.maxDiagnosticChars ?? 200;
    this.connectionTestTimeoutMs = options.connectionTestTimeoutMs ?? 10_000;
    this.observer = options.observer;
  }

  private emit(transition: DispatchTransition): void {
    if (!this.observer) return;
    try {
      this.observer(transition);
    } catch (err) {
      log.warn(`dispatch observer threw: ${errorMessage(err)}`);
    }
  }

  private failed(
    target: ResolvedModel,
    errorKind: DispatchErrorKind,
    diagnostic: string,
  ): DispatchResult {
    return failedResult(target, errorKind, diagnostic, this.maxDiagnosticChars);
  }

  private classify(err: unknown, guard: CallGuard): { errorKind: DispatchErrorKind; diagnostic: string } {
    switch (guard.abortReason) {
      case "timeout":
        return { errorKind: "timeout", diagnostic: "Request timeout" };
      case "cancelled":
        return { errorKind: "transportError", diagnostic: "Request cancelled by caller" };
      default:
        break;
    }
    if (err instanceof TransportError) {
      return { errorKind: "transportError", diagnostic: err.message };
    }
    if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
      return { errorKind: "timeout", diagnostic: "Request timeout" };
    }
    return { errorKind: "internalError", diagnostic: `Unexpected error: ${errorMessage(err)}` };
  }

  async dispatch(
    target: ResolvedModel,
    bundle: ContextBundle,
    credential: string | undefined,
    options: DispatchCallOptions = {},
  ): Promise<DispatchResult> {
    const callId = this.nextCallId++;
    const adapter: ProviderAdapter = this.adapters.adapterFor(target.provider);
    // Unknown provider tags run on the fallback adapter and report as such.
    const resolved: ResolvedModel = { provider: adapter.provider, model: target.model };
    this.emit({ callId, state: "not_started", provider: resolved.provider, model: resolved.model });

    const finish = (result: DispatchResult, startedAt: number): DispatchResult => {
      this.emit({
        callId,
        state: result.status,
        provider: resolved.provider,
        model: resolved.model,
        errorKind: result.errorKind,
      });
      log.info(
        `dispatch #${callId}: provider=${resolved.provider} model=${resolved.model} status=${result.status}` +
          (result.errorKind ? ` errorKind=${result.errorKind}` : "") +
          ` ms=${Date.now() - startedAt}`,
      );
      return result;
    };

    const startedAt = Date.now();
    const secret = credential?.trim() ?? "";
    if (adapter.requiresCredential && secret.length === 0) {
      return finish(this.failed(resolved, "authError", "No API key provided"), startedAt);
    }

    const timeoutMs = options.timeoutMs ?? adapter.defaultTimeoutMs;
    const guard = new CallGuard(timeoutMs, options.signal);
    this.emit({ callId, state: "in_flight", provider: resolved.provider, model: resolved.model });

    let outcome: AdapterOutcome;
    try {
      outcome = await adapter.send({
        model: resolved.model,
        bundle,
        credential: secret,
        signal: guard.signal,
        timeoutMs,
      });
    } catch (err) {
      const { errorKind, diagnostic } = this.classify(err, guard);
      if (errorKind === "internalError") {
        log.error(`dispatch #${callId}: ${resolved.provider} adapter failed:`, err);
      }
      return finish(this.failed(resolved, errorKind, diagnostic), startedAt);
    } finally {
      guard.dispose();
    }

    if (!outcome.ok) {
      return finish(this.failed(resolved, outcome.errorKind, outcome.diagnostic), startedAt);
    }

    return finish(
      {
        status: "succeeded",
        reply: outcome.reply,
        provider: resolved.provider,
        canonicalModel: resolved.model,
        modelUsed: outcome.modelUsed || resolved.model,
        tokenUsage: outcome.tokenUsage,
      },
      startedAt,
    );
  }

  /**
   * Check a credential with the provider's cheapest authenticated request.
   */
  async testConnection(provider: ProviderId, credential: string | undefined): Promise<ConnectionTestResult> {
    const adapter = this.adapters.adapterFor(provider);
    if (adapter.provider !== provider) {
      return { success: false, error: `Unknown provider: ${provider}` };
    }
    const secret = credential?.trim() ?? "";
    if (adapter.requiresCredential && secret.length === 0) {
      return { success: false, error: "No API key provided" };
    }

    const guard = new CallGuard(this.connectionTestTimeoutMs);
    try {
      return await adapter.probe(secret, guard.signal);
    } catch (err) {
      const { errorKind, diagnostic } = this.classify(err, guard);
      switch (errorKind) {
        case "timeout":
          return { success: false, error: "Connection timeout - API did not respond in time" };
        case "transportError":
          return { success: false, error: "Connection error - unable to reach API" };
        default:
          log.error(`connection test for ${provider} failed:`, err);
          return { success: false, error: diagnostic };
      }
    } finally {
      guard.dispose();
    }
  }
}

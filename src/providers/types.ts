import type {
  ConnectionTestResult,
  ContextBundle,
  DispatchErrorKind,
  ProviderId,
} from "../types.js";

export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export interface AdapterSettings {
  /** Overrides the provider's public endpoint. */
  baseUrl?: string;
  timeoutMs: number;
  temperature: number;
  maxOutputTokens: number;
  maxDiagnosticChars: number;
  /** Resolved at call time; defaults to the global fetch. */
  fetch?: FetchLike;
}

export interface AdapterCall {
  model: string;
  bundle: ContextBundle;
  credential: string;
  signal: AbortSignal;
  timeoutMs: number;
}

export type AdapterOutcome =
  | { ok: true; reply: string; modelUsed: string; tokenUsage: number }
  | { ok: false; errorKind: DispatchErrorKind; diagnostic: string };

/**
 * One provider's wire format. `send` reports every HTTP-level failure as an
 * outcome value; only requests that never got a response may throw.
 */
export interface ProviderAdapter {
  readonly provider: ProviderId;
  readonly requiresCredential: boolean;
  readonly defaultTimeoutMs: number;
  send(call: AdapterCall): Promise<AdapterOutcome>;
  /** Cheapest authenticated request the provider offers. */
  probe(credential: string, signal: AbortSignal): Promise<ConnectionTestResult>;
}

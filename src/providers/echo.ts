import { wordCount } from "../importance.js";
import type { ConnectionTestResult } from "../types.js";
import type { AdapterCall, AdapterOutcome, ProviderAdapter } from "./types.js";

export function echoReply(userMessage: string): string {
  return (
    `[Echo Mode] Received: ${userMessage}\n\n` +
    "This is a demo response. Connect an LLM provider to get real AI responses."
  );
}

/**
 * Offline stand-in for unresolved models and accounts without an integration.
 * Always succeeds; needs no credential.
 */
export class EchoAdapter implements ProviderAdapter {
  readonly provider = "echo" as const;
  readonly requiresCredential = false;
  readonly defaultTimeoutMs = 1000;

  async send(call: AdapterCall): Promise<AdapterOutcome> {
    return {
      ok: true,
      reply: echoReply(call.bundle.userMessage),
      modelUsed: call.model,
      tokenUsage: wordCount(call.bundle.userMessage),
    };
  }

  async probe(): Promise<ConnectionTestResult> {
    return { success: true };
  }
}

/**
 * Model Registry - maps loosely formatted model identifiers to a canonical
 * (provider, model) pair.
 *
 * Upstream callers are inconsistent ("model-gpt4o", "GPT-4", "claude-35-sonnet"),
 * so lookup degrades through exact, case-insensitive and punctuation-free
 * matches before settling on the echo provider. Resolution never fails.
 */

import { log } from "./logger.js";
import type { ProviderId, ProviderModel, ResolvedModel } from "./types.js";

export const KNOWN_MODELS: Readonly<Record<string, ProviderId>> = {
  "gpt-4": "openai",
  "gpt-4-turbo": "openai",
  "gpt-4o": "openai",
  "gpt-3.5-turbo": "openai",

  "claude-3-opus": "anthropic",
  "claude-3-sonnet": "anthropic",
  "claude-3-haiku": "anthropic",
  "claude-3.5-sonnet": "anthropic",

  "gemini-2.0-flash": "google",
  "gemini-2.0-flash-exp": "google",
  "gemini-1.5-flash": "google",
  "gemini-1.5-pro": "google",

  "deepseek-chat": "deepseek",
  "deepseek-coder": "deepseek",

  "llama-3.3-70b-versatile": "groq",
  "llama-3.1-8b-instant": "groq",
  "mixtral-8x7b-32768": "groq",
  "gemma2-9b-it": "groq",

  echo: "echo",
};

export const DEFAULT_MODEL_PREFIX = "model-";

function stripPunctuation(value: string): string {
  return value.replace(/[.\-_]/g, "").toLowerCase();
}

function displayName(model: string): string {
  return model
    .split("-")
    .filter((w) => w.length > 0)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}

export class ModelRegistry {
  private readonly prefix: string;
  private readonly exact: ReadonlyMap<string, ProviderId>;
  private readonly lower: ReadonlyMap<string, string>;
  private readonly stripped: ReadonlyMap<string, string>;

  constructor(
    models: Readonly<Record<string, ProviderId>> = KNOWN_MODELS,
    prefix: string = DEFAULT_MODEL_PREFIX,
  ) {
    this.prefix = prefix;
    const exact = new Map<string, ProviderId>();
    const lower = new Map<string, string>();
    const stripped = new Map<string, string>();

    // First entry wins on collisions.
    for (const [model, provider] of Object.entries(models)) {
      exact.set(model, provider);
      if (!lower.has(model.toLowerCase())) lower.set(model.toLowerCase(), model);
      const key = stripPunctuation(model);
      if (!stripped.has(key)) stripped.set(key, model);
    }

    this.exact = exact;
    this.lower = lower;
    this.stripped = stripped;
  }

  private clean(identifier: string): string {
    const trimmed = identifier.trim();
    return this.prefix && trimmed.startsWith(this.prefix) ? trimmed.slice(this.prefix.length) : trimmed;
  }

  private lookup(identifier: string): string | undefined {
    if (this.exact.has(identifier)) return identifier;
    return this.lower.get(identifier.toLowerCase()) ?? this.stripped.get(stripPunctuation(identifier));
  }

  resolve(identifier: string): ResolvedModel {
    const clean = this.clean(typeof identifier === "string" ? identifier : "");
    const canonical = this.lookup(clean);
    const provider = canonical ? this.exact.get(canonical) : undefined;

    if (canonical && provider) {
      return { provider, model: canonical };
    }

    log.debug(`model registry: no match for "${clean}", using echo`);
    return { provider: "echo", model: clean.length > 0 ? clean : "echo" };
  }

  isSupported(identifier: string): boolean {
    return typeof identifier === "string" && this.lookup(this.clean(identifier)) !== undefined;
  }

  /**
   * Known models, optionally limited to the given providers (e.g. the ones an
   * account has connected), in table order.
   */
  listModels(providers?: readonly ProviderId[]): ProviderModel[] {
    const out: ProviderModel[] = [];
    for (const [model, provider] of this.exact) {
      if (providers && !providers.includes(provider)) continue;
      out.push({
        id: model,
        publicId: `${this.prefix}${model.replace(/[._]/g, "")}`,
        provider,
        displayName: displayName(model),
      });
    }
    return out;
  }
}

import type { EngineConfig, ProviderId } from "../types.js";
import { isProviderId } from "../types.js";
import { AnthropicAdapter } from "./anthropic.js";
import { EchoAdapter } from "./echo.js";
import { GoogleAdapter } from "./google.js";
import { OpenAICompatibleAdapter } from "./openai-compatible.js";
import type { AdapterSettings, FetchLike, ProviderAdapter } from "./types.js";

/**
 * Provider tag to adapter. Unknown tags get the echo adapter, so lookups are total.
 */
export class AdapterRegistry {
  private readonly adapters = new Map<ProviderId, ProviderAdapter>();
  private readonly fallback: ProviderAdapter;

  constructor(adapters: ProviderAdapter[] = [], fallback: ProviderAdapter = new EchoAdapter()) {
    this.fallback = fallback;
    this.register(fallback);
    for (const adapter of adapters) this.register(adapter);
  }

  register(adapter: ProviderAdapter): this {
    this.adapters.set(adapter.provider, adapter);
    return this;
  }

  adapterFor(provider: string): ProviderAdapter {
    return (isProviderId(provider) ? this.adapters.get(provider) : undefined) ?? this.fallback;
  }

  providers(): ProviderId[] {
    return [...this.adapters.keys()];
  }
}

export function createDefaultAdapters(config: EngineConfig, fetchImpl?: FetchLike): AdapterRegistry {
  const settings = (provider: ProviderId, timeoutMs: number): AdapterSettings => ({
    baseUrl: config.providerBaseUrls[provider],
    timeoutMs,
    temperature: config.temperature,
    maxOutputTokens: config.maxOutputTokens,
    maxDiagnosticChars: config.maxDiagnosticChars,
    fetch: fetchImpl,
  });

  return new AdapterRegistry([
    new OpenAICompatibleAdapter("openai", settings("openai", config.requestTimeoutMs)),
    new AnthropicAdapter(settings("anthropic", config.requestTimeoutMs)),
    new GoogleAdapter(settings("google", config.requestTimeoutMs)),
    new OpenAICompatibleAdapter("groq", settings("groq", config.fastRequestTimeoutMs)),
    new OpenAICompatibleAdapter("deepseek", settings("deepseek", config.requestTimeoutMs)),
  ]);
}

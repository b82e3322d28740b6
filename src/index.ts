export { parseConfig } from "./config.js";
export { initLogger, log, setDebugLogging, type LoggerBackend } from "./logger.js";
export { Orchestrator } from "./orchestrator.js";
export type {
  ExchangeInput,
  OrchestratorOptions,
  OrchestratorStores,
  SendMessageRequest,
  SendMessageResult,
} from "./orchestrator.js";

export { RelevanceScorer, tokenize, scoreMemory, DEFAULT_CANDIDATE_LIMIT } from "./retrieval.js";
export { MemoryIndex } from "./memory-index.js";
export { classifyImportance, generateTags, importanceScore, shouldPersist } from "./importance.js";
export { classifyText, extractFacts, planExchangeMemories } from "./extraction.js";
export { createMemoryRecord, makeSnippet, reviseMemory } from "./memory.js";
export { sanitizeInjectedContent } from "./sanitize.js";
export {
  assembleContext,
  formatMemoriesBlock,
  toChatMessages,
  DEFAULT_CONTEXT_BUDGET,
  TRUNCATION_MARKER,
  type ContextBudget,
  type ContextInput,
} from "./context.js";
export { ModelRegistry, KNOWN_MODELS, DEFAULT_MODEL_PREFIX } from "./model-registry.js";
export {
  DispatchExecutor,
  failedResult,
  type DispatchCallOptions,
  type DispatchExecutorOptions,
  type DispatchTransition,
} from "./dispatch.js";
export { AdapterRegistry, createDefaultAdapters } from "./providers/registry.js";
export { AnthropicAdapter } from "./providers/anthropic.js";
export { GoogleAdapter } from "./providers/google.js";
export { OpenAICompatibleAdapter } from "./providers/openai-compatible.js";
export { EchoAdapter } from "./providers/echo.js";
export type {
  AdapterCall,
  AdapterOutcome,
  AdapterSettings,
  FetchLike,
  ProviderAdapter,
} from "./providers/types.js";
export { InMemoryConversationStore, InMemoryMemoryStore, StaticCredentialStore } from "./stores.js";
export { TransportError } from "./errors.js";
export * from "./types.js";

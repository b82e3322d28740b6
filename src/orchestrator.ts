import { initLogger, log, setDebugLogging, type LoggerBackend } from "./logger.js";
import { assembleContext, type ContextBudget } from "./context.js";
import { DispatchExecutor, failedResult, type DispatchCallOptions, type DispatchTransition } from "./dispatch.js";
import { errorMessage } from "./errors.js";
import { classifyText, planExchangeMemories } from "./extraction.js";
import { createMemoryRecord, reviseMemory } from "./memory.js";
import { MemoryIndex } from "./memory-index.js";
import { KNOWN_MODELS, ModelRegistry } from "./model-registry.js";
import { createDefaultAdapters, type AdapterRegistry } from "./providers/registry.js";
import type { FetchLike } from "./providers/types.js";
import { RelevanceScorer } from "./retrieval.js";
import type {
  Classification,
  ConnectionTestResult,
  ContextBundle,
  ConversationStore,
  CredentialStore,
  DispatchResult,
  EngineConfig,
  IndexStatus,
  MemoryPatch,
  MemoryRecord,
  MemoryStore,
  ProviderId,
  ProviderModel,
  ResolvedModel,
  ScoredResult,
} from "./types.js";

export interface OrchestratorStores {
  memories: MemoryStore;
  conversations: ConversationStore;
  credentials: CredentialStore;
}

export interface OrchestratorOptions {
  /** Replaces the global fetch for every HTTP adapter. */
  fetch?: FetchLike;
  observer?: (transition: DispatchTransition) => void;
  /** Replaces the default adapter set entirely. */
  adapters?: AdapterRegistry;
  /** Host logger to bind; `config.debug` applies either way. */
  logger?: LoggerBackend;
}

export interface SendMessageRequest {
  accountId: string;
  conversationId: string;
  workspaceId: string;
  modelId: string;
  message: string;
  signal?: AbortSignal;
}

export interface SendMessageResult {
  result: DispatchResult;
  savedMemories: MemoryRecord[];
}

export interface ExchangeInput {
  workspaceId: string;
  conversationId: string;
  userMessage: string;
  reply: string;
  modelUsed?: string;
}

/**
 * Composition root. Owns the registry, index, scorer and executor, and reaches
 * persistence only through the store interfaces it was given.
 */
export class Orchestrator {
  readonly config: EngineConfig;
  readonly models: ModelRegistry;
  readonly index: MemoryIndex;
  private readonly stores: OrchestratorStores;
  private readonly scorer: RelevanceScorer;
  private readonly adapters: AdapterRegistry;
  private readonly executor: DispatchExecutor;

  constructor(config: EngineConfig, stores: OrchestratorStores, options: OrchestratorOptions = {}) {
    if (options.logger) initLogger(options.logger, config.debug);
    else setDebugLogging(config.debug);
    this.config = config;
    this.stores = stores;
    this.models = new ModelRegistry(KNOWN_MODELS, config.modelPrefix);
    this.index = new MemoryIndex();
    this.scorer = new RelevanceScorer(stores.memories, {
      candidateLimit: config.searchCandidateLimit,
      defaultTopK: config.searchTopK,
      index: this.index,
    });
    this.adapters = options.adapters ?? createDefaultAdapters(config, options.fetch);
    this.executor = new DispatchExecutor(this.adapters, {
      maxDiagnosticChars: config.maxDiagnosticChars,
      connectionTestTimeoutMs: config.connectionTestTimeoutMs,
      observer: options.observer,
    });
  }

  private get budget(): ContextBudget {
    return {
      maxMemories: this.config.maxInjectedMemories,
      maxMemoryChars: this.config.maxMemoryChars,
      historyLimit: this.config.historyLimit,
      sanitize: this.config.sanitizeInjectedMemories,
    };
  }

  search(query: string, scope?: string, topK?: number): Promise<ScoredResult[]> {
    return this.scorer.search(query, topK ?? this.config.searchTopK, scope);
  }

  classify(text: string): Classification {
    return classifyText(text);
  }

  async buildContext(conversationId: string, userMessage: string): Promise<ContextBundle> {
    const [memories, history] = await Promise.all([
      this.stores.conversations.activeInjectedMemories(conversationId),
      this.stores.conversations.history(conversationId, this.config.historyLimit),
    ]);
    return assembleContext(
      { systemPrompt: this.config.systemPrompt, memories, history, userMessage },
      this.budget,
    );
  }

  resolveProvider(identifier: string): ResolvedModel {
    return this.models.resolve(identifier);
  }

  dispatch(
    identifier: string,
    bundle: ContextBundle,
    credential: string | undefined,
    options?: DispatchCallOptions,
  ): Promise<DispatchResult> {
    return this.executor.dispatch(this.resolveProvider(identifier), bundle, credential, options);
  }

  private async credentialFor(accountId: string, provider: ProviderId): Promise<string | undefined> {
    if (!this.adapters.adapterFor(provider).requiresCredential) return undefined;
    return this.stores.credentials.credentialFor(accountId, provider);
  }

  /**
   * One chat turn: build context, dispatch, record both messages, keep what
   * is worth remembering. Never throws; failures come back in `result`.
   */
  async sendMessage(req: SendMessageRequest): Promise<SendMessageResult> {
    const target = this.resolveProvider(req.modelId);

    let bundle: ContextBundle;
    let credential: string | undefined;
    try {
      // Context is read before the new message is appended, so it is not duplicated in history.
      bundle = await this.buildContext(req.conversationId, req.message);
      credential = await this.credentialFor(req.accountId, target.provider);
    } catch (err) {
      log.error(`sendMessage: preparing ${req.conversationId} failed:`, err);
      return {
        result: failedResult(
          target,
          "internalError",
          `Unexpected error: ${errorMessage(err)}`,
          this.config.maxDiagnosticChars,
        ),
        savedMemories: [],
      };
    }

    const result = await this.executor.dispatch(target, bundle, credential, { signal: req.signal });
    if (result.status !== "succeeded") return { result, savedMemories: [] };

    try {
      const userAt = new Date().toISOString();
      await this.stores.conversations.appendMessage(req.conversationId, {
        role: "user",
        content: req.message,
        timestamp: userAt,
      });
      await this.stores.conversations.appendMessage(req.conversationId, {
        role: "assistant",
        content: result.reply,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      log.warn(`sendMessage: could not record messages for ${req.conversationId}:`, err);
    }

    const savedMemories = this.config.autoExtractEnabled
      ? await this.ingestExchange({
          workspaceId: req.workspaceId,
          conversationId: req.conversationId,
          userMessage: req.message,
          reply: result.reply,
          modelUsed: result.modelUsed,
        })
      : [];

    return { result, savedMemories };
  }

  /**
   * Persist the memories an exchange yields. A failed save is logged and
   * skipped; the rest are still written.
   */
  async ingestExchange(input: ExchangeInput): Promise<MemoryRecord[]> {
    const plan = planExchangeMemories(input.userMessage, input.reply, {
      workspaceId: input.workspaceId,
      conversationId: input.conversationId,
      modelUsed: input.modelUsed,
    });
    if (plan.drafts.length === 0) return [];

    const saved: MemoryRecord[] = [];
    for (const draft of plan.drafts) {
      const record = createMemoryRecord(draft);
      try {
        await this.stores.memories.save(record);
      } catch (err) {
        log.warn(`ingest: failed to save "${record.title}":`, err);
        continue;
      }
      this.index.upsert(record);
      saved.push(record);
    }
    log.info(
      `ingest: ${saved.length}/${plan.drafts.length} memories saved (importance=${plan.importance}) for ${input.conversationId}`,
    );
    return saved;
  }

  async reviseMemory(id: string, patch: MemoryPatch): Promise<MemoryRecord> {
    const current = await this.stores.memories.get(id);
    if (!current) throw new Error(`memory ${id} not found`);
    const next = reviseMemory(current, patch);
    await this.stores.memories.save(next);
    this.index.upsert(next);
    return next;
  }

  async rebuildIndex(scope?: string): Promise<IndexStatus> {
    const records = await this.stores.memories.fetchCandidates(scope, this.config.searchCandidateLimit);
    return this.index.rebuild(records);
  }

  indexStatus(): IndexStatus {
    return this.index.status();
  }

  listModels(providers?: readonly ProviderId[]): ProviderModel[] {
    return this.models.listModels(providers);
  }

  /** Models the account can reach: providers needing no key plus those it holds a key for. */
  async availableModels(accountId: string): Promise<ProviderModel[]> {
    const connected: ProviderId[] = [];
    for (const provider of this.adapters.providers()) {
      if (!this.adapters.adapterFor(provider).requiresCredential) {
        connected.push(provider);
        continue;
      }
      const secret = await this.stores.credentials.credentialFor(accountId, provider);
      if (secret && secret.trim().length > 0) connected.push(provider);
    }
    return this.models.listModels(connected);
  }

  testConnection(provider: ProviderId, credential: string | undefined): Promise<ConnectionTestResult> {
    return this.executor.testConnection(provider, credential);
  }
}

export type ImportanceLevel = "none" | "low" | "medium" | "high";
export type ExtractionConfidence = "high" | "medium";
export type ExtractionProvenance = "pattern" | "keyword";
export type ChatRole = "system" | "user" | "assistant";
export type ProviderId = "openai" | "anthropic" | "google" | "groq" | "deepseek" | "echo";

export const PROVIDER_IDS: readonly ProviderId[] = [
  "openai",
  "anthropic",
  "google",
  "groq",
  "deepseek",
  "echo",
];

export function isProviderId(value: unknown): value is ProviderId {
  return typeof value === "string" && PROVIDER_IDS.some((id) => id === value);
}

export interface MemoryRecord {
  id: string;
  workspaceId: string;
  title: string;
  content: string;
  /** First 150 chars of content, "..." appended when longer. */
  snippet: string;
  tags: string[];
  metadata: Record<string, unknown>;
  /** Starts at 1, bumped on every revision, never reset. */
  version: number;
  createdAt: string;
  updatedAt: string;
}

/** A memory that has not been stored yet. */
export interface NewMemory {
  workspaceId: string;
  title: string;
  content: string;
  tags: string[];
  metadata: Record<string, unknown>;
}

export interface MemoryPatch {
  title?: string;
  content?: string;
  tags?: string[];
  metadata?: Record<string, unknown>;
}

export interface ChatMessage {
  role: ChatRole;
  content: string;
  timestamp: string;
}

export interface InjectedMemoryLink {
  conversationId: string;
  memoryId: string;
  active: boolean;
}

export interface ScoredResult {
  memory: MemoryRecord;
  /** Lexical overlap in [0, 1]. */
  score: number;
}

export interface ExtractionCandidate {
  text: string;
  confidence: ExtractionConfidence;
  provenance: ExtractionProvenance;
}

export interface Classification {
  importance: ImportanceLevel;
  tags: string[];
  score: number;
  candidates: ExtractionCandidate[];
}

export interface ProviderModel {
  /** Canonical model id, e.g. "gpt-4o". */
  id: string;
  /** Identifier clients send, e.g. "model-gpt-4o". */
  publicId: string;
  provider: ProviderId;
  displayName: string;
}

export interface ResolvedModel {
  provider: ProviderId;
  model: string;
}

export interface InjectedMemoryBlock {
  memoryId: string;
  title: string;
  content: string;
  truncated: boolean;
}

export interface ContextBundle {
  /** Instructions, followed by the memories block when there is one. */
  system: string;
  memories: InjectedMemoryBlock[];
  /** Chronological, oldest first. */
  history: ChatMessage[];
  userMessage: string;
}

export type DispatchState = "not_started" | "in_flight" | "succeeded" | "failed";
export type DispatchErrorKind =
  | "authError"
  | "timeout"
  | "transportError"
  | "upstreamError"
  | "internalError";

export interface DispatchResult {
  status: "succeeded" | "failed";
  reply: string;
  provider: ProviderId;
  canonicalModel: string;
  /** Model id the provider echoed back; the canonical id when it echoed nothing. */
  modelUsed: string;
  tokenUsage: number;
  errorKind?: DispatchErrorKind;
  /** Truncated provider or transport message, failures only. */
  diagnostic?: string;
}

export interface ConnectionTestResult {
  success: boolean;
  error?: string;
}

export interface IndexStatus {
  entries: number;
  generation: number;
  builtAt: string | null;
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface MemoryStore {
  /** Newest first, at most `limit` records. `scope` is a workspace id, or undefined for all. */
  fetchCandidates(scope: string | undefined, limit: number): Promise<MemoryRecord[]>;
  get(id: string): Promise<MemoryRecord | undefined>;
  save(record: MemoryRecord): Promise<void>;
  bumpVersion(id: string): Promise<number>;
}

export interface ConversationStore {
  /** Chronological, at most the `limit` most recent messages. */
  history(conversationId: string, limit: number): Promise<ChatMessage[]>;
  activeInjectedMemories(conversationId: string): Promise<MemoryRecord[]>;
  appendMessage(conversationId: string, message: ChatMessage): Promise<void>;
}

export interface CredentialStore {
  /** Already decrypted. Never logged. */
  credentialFor(accountId: string, provider: ProviderId): Promise<string | undefined>;
}

export interface EngineConfig {
  systemPrompt: string;
  maxInjectedMemories: number;
  maxMemoryChars: number;
  historyLimit: number;
  searchCandidateLimit: number;
  searchTopK: number;
  sanitizeInjectedMemories: boolean;
  modelPrefix: string;
  requestTimeoutMs: number;
  fastRequestTimeoutMs: number;
  connectionTestTimeoutMs: number;
  maxDiagnosticChars: number;
  temperature: number;
  maxOutputTokens: number;
  providerBaseUrls: Partial<Record<ProviderId, string>>;
  autoExtractEnabled: boolean;
  debug: boolean;
}

import type {
  ChatMessage,
  ConversationStore,
  CredentialStore,
  InjectedMemoryLink,
  MemoryRecord,
  MemoryStore,
  ProviderId,
} from "./types.js";

function byNewest(a: MemoryRecord, b: MemoryRecord): number {
  return Date.parse(b.createdAt) - Date.parse(a.createdAt);
}

/**
 * Process-local MemoryStore. Suitable for tests and single-process hosts.
 */
export class InMemoryMemoryStore implements MemoryStore {
  private readonly records = new Map<string, MemoryRecord>();

  constructor(initial: MemoryRecord[] = []) {
    for (const record of initial) this.records.set(record.id, { ...record });
  }

  async fetchCandidates(scope: string | undefined, limit: number): Promise<MemoryRecord[]> {
    return [...this.records.values()]
      .filter((r) => scope === undefined || r.workspaceId === scope)
      .sort(byNewest)
      .slice(0, Math.max(0, limit));
  }

  async get(id: string): Promise<MemoryRecord | undefined> {
    return this.records.get(id);
  }

  /**
   * Rejects writes that would move a record's version backwards, or change
   * its title or content without a new version.
   */
  async save(record: MemoryRecord): Promise<void> {
    const existing = this.records.get(record.id);
    if (existing && record.version < existing.version) {
      throw new Error(
        `memory ${record.id}: refusing to save version ${record.version} over ${existing.version}`,
      );
    }
    if (
      existing &&
      record.version === existing.version &&
      (record.title !== existing.title || record.content !== existing.content)
    ) {
      throw new Error(`memory ${record.id}: content changed without a version bump (v${record.version})`);
    }
    this.records.set(record.id, { ...record });
  }

  async bumpVersion(id: string): Promise<number> {
    const existing = this.records.get(id);
    if (!existing) throw new Error(`memory ${id} not found`);
    const next = { ...existing, version: existing.version + 1, updatedAt: new Date().toISOString() };
    this.records.set(id, next);
    return next.version;
  }

  size(): number {
    return this.records.size;
  }
}

function linkKey(conversationId: string, memoryId: string): string {
  return `${conversationId}\u0000${memoryId}`;
}

/**
 * Process-local ConversationStore. Injected-memory links are keyed by
 * (conversation, memory), so one pair never has two links.
 */
export class InMemoryConversationStore implements ConversationStore {
  private readonly messages = new Map<string, ChatMessage[]>();
  private readonly links = new Map<string, InjectedMemoryLink>();
  private readonly memories: MemoryStore;

  constructor(memories: MemoryStore) {
    this.memories = memories;
  }

  async history(conversationId: string, limit: number): Promise<ChatMessage[]> {
    const all = this.messages.get(conversationId) ?? [];
    return limit > 0 ? all.slice(-limit) : [];
  }

  async appendMessage(conversationId: string, message: ChatMessage): Promise<void> {
    const list = this.messages.get(conversationId) ?? [];
    list.push({ ...message });
    this.messages.set(conversationId, list);
  }

  /** Link a memory; an existing link for the pair is reactivated, not duplicated. */
  inject(conversationId: string, memoryId: string): InjectedMemoryLink {
    const key = linkKey(conversationId, memoryId);
    const link = this.links.get(key) ?? { conversationId, memoryId, active: true };
    link.active = true;
    this.links.set(key, link);
    return link;
  }

  setActive(conversationId: string, memoryId: string, active: boolean): boolean {
    const link = this.links.get(linkKey(conversationId, memoryId));
    if (!link) return false;
    link.active = active;
    return true;
  }

  remove(conversationId: string, memoryId: string): boolean {
    return this.links.delete(linkKey(conversationId, memoryId));
  }

  linksFor(conversationId: string): InjectedMemoryLink[] {
    return [...this.links.values()].filter((l) => l.conversationId === conversationId);
  }

  /** Active links in injection order; links to deleted memories are skipped. */
  async activeInjectedMemories(conversationId: string): Promise<MemoryRecord[]> {
    const out: MemoryRecord[] = [];
    for (const link of this.linksFor(conversationId)) {
      if (!link.active) continue;
      const memory = await this.memories.get(link.memoryId);
      if (memory) out.push(memory);
    }
    return out;
  }
}

export class StaticCredentialStore implements CredentialStore {
  private readonly secrets = new Map<string, string>();

  set(accountId: string, provider: ProviderId, secret: string): this {
    this.secrets.set(`${accountId}/${provider}`, secret);
    return this;
  }

  async credentialFor(accountId: string, provider: ProviderId): Promise<string | undefined> {
    return this.secrets.get(`${accountId}/${provider}`);
  }
}

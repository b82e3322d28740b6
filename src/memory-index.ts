import { log } from "./logger.js";
import { memoryTokens, type MemoryTokens } from "./retrieval.js";
import type { IndexStatus, MemoryRecord } from "./types.js";

interface IndexEntry {
  version: number;
  tokens: MemoryTokens;
}

interface IndexSnapshot {
  entries: ReadonlyMap<string, IndexEntry>;
  generation: number;
  builtAt: string | null;
}

/**
 * Token-set cache keyed by memory id and version.
 *
 * Readers always see one complete snapshot: rebuilds and upserts construct a
 * new map and replace the snapshot reference in a single assignment.
 */
export class MemoryIndex {
  private snapshot: IndexSnapshot = { entries: new Map(), generation: 0, builtAt: null };

  rebuild(records: MemoryRecord[]): IndexStatus {
    const entries = new Map<string, IndexEntry>();
    for (const record of records) {
      entries.set(record.id, { version: record.version, tokens: memoryTokens(record) });
    }
    this.snapshot = {
      entries,
      generation: this.snapshot.generation + 1,
      builtAt: new Date().toISOString(),
    };
    log.info(`memory index rebuilt: ${entries.size} entries (generation ${this.snapshot.generation})`);
    return this.status();
  }

  upsert(record: MemoryRecord): void {
    const current = this.snapshot;
    const entries = new Map(current.entries);
    entries.set(record.id, { version: record.version, tokens: memoryTokens(record) });
    this.snapshot = { ...current, entries };
  }

  remove(id: string): void {
    const current = this.snapshot;
    if (!current.entries.has(id)) return;
    const entries = new Map(current.entries);
    entries.delete(id);
    this.snapshot = { ...current, entries };
  }

  /** Cached tokens, or undefined when the entry is missing or from an older version. */
  lookup(record: Pick<MemoryRecord, "id" | "version">): MemoryTokens | undefined {
    const entry = this.snapshot.entries.get(record.id);
    if (!entry || entry.version !== record.version) return undefined;
    return entry.tokens;
  }

  status(): IndexStatus {
    const { entries, generation, builtAt } = this.snapshot;
    return { entries: entries.size, generation, builtAt };
  }
}

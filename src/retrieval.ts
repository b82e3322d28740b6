import { readFileSync } from "node:fs";
import { z } from "zod";
import { log } from "./logger.js";
import type { MemoryIndex } from "./memory-index.js";
import type { MemoryRecord, MemoryStore, ScoredResult } from "./types.js";

const STOPWORDS: ReadonlySet<string> = new Set(
  z
    .array(z.string())
    .parse(JSON.parse(readFileSync(new URL("../data/stopwords.json", import.meta.url), "utf-8"))),
);

export const DEFAULT_CANDIDATE_LIMIT = 100;

/**
 * Lower-cased letter and digit runs (any script) longer than two characters,
 * stopwords removed.
 */
export function tokenize(text: string): Set<string> {
  const source = typeof text === "string" ? text : "";
  const tokens = new Set<string>();
  for (const raw of source.toLowerCase().split(/[^\p{L}\p{N}]+/gu)) {
    if (raw.length <= 2 || STOPWORDS.has(raw)) continue;
    tokens.add(raw);
  }
  return tokens;
}

export interface MemoryTokens {
  title: ReadonlySet<string>;
  all: ReadonlySet<string>;
}

export function memoryTokens(memory: Pick<MemoryRecord, "title" | "content">): MemoryTokens {
  return {
    title: tokenize(memory.title),
    all: tokenize(`${memory.title} ${memory.content}`),
  };
}

function overlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let n = 0;
  for (const t of a) if (b.has(t)) n++;
  return n;
}

/**
 * Asymmetric overlap: title hits count double, normalized by query size, capped at 1.
 */
export function scoreTokens(queryTokens: ReadonlySet<string>, tokens: MemoryTokens): number {
  if (queryTokens.size === 0) return 0;
  const matches = overlap(queryTokens, tokens.all);
  if (matches === 0) return 0;

  const titleMatches = overlap(queryTokens, tokens.title);
  const contentMatches = matches - titleMatches;
  return Math.min(1, (titleMatches * 2 + contentMatches) / queryTokens.size);
}

export function scoreMemory(
  queryTokens: ReadonlySet<string>,
  memory: Pick<MemoryRecord, "title" | "content">,
): number {
  return scoreTokens(queryTokens, memoryTokens(memory));
}

/** Higher score first; equal scores go to the newer memory. */
export function compareScored(a: ScoredResult, b: ScoredResult): number {
  if (b.score !== a.score) return b.score - a.score;
  return Date.parse(b.memory.createdAt) - Date.parse(a.memory.createdAt);
}

export interface RelevanceScorerOptions {
  candidateLimit?: number;
  defaultTopK?: number;
  index?: MemoryIndex;
}

/**
 * Keyword-overlap search over a bounded, recency-ordered candidate pool.
 * A search never throws: store failures and empty queries yield [].
 */
export class RelevanceScorer {
  private readonly store: MemoryStore;
  private readonly candidateLimit: number;
  private readonly defaultTopK: number;
  private readonly index: MemoryIndex | undefined;

  constructor(store: MemoryStore, options: RelevanceScorerOptions = {}) {
    this.store = store;
    this.candidateLimit = options.candidateLimit ?? DEFAULT_CANDIDATE_LIMIT;
    this.defaultTopK = options.defaultTopK ?? 5;
    this.index = options.index;
  }

  async search(query: string, topK: number = this.defaultTopK, scope?: string): Promise<ScoredResult[]> {
    if (!(topK > 0)) return [];

    const queryTokens = tokenize(query);
    if (queryTokens.size === 0) return [];

    let candidates: MemoryRecord[];
    try {
      candidates = await this.store.fetchCandidates(scope, this.candidateLimit);
    } catch (err) {
      log.warn(`search: candidate fetch failed for scope=${scope ?? "*"}:`, err);
      return [];
    }

    const scored: ScoredResult[] = [];
    for (const memory of candidates.slice(0, this.candidateLimit)) {
      const tokens = this.index?.lookup(memory) ?? memoryTokens(memory);
      const score = scoreTokens(queryTokens, tokens);
      if (score > 0) scored.push({ memory, score });
    }

    scored.sort(compareScored);
    log.debug(`search: ${candidates.length} candidates, ${scored.length} hits, topK=${topK}`);
    return scored.slice(0, Math.floor(topK));
  }
}

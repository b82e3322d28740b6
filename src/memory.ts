import { randomUUID } from "node:crypto";
import type { MemoryPatch, MemoryRecord, NewMemory } from "./types.js";

const SNIPPET_CHARS = 150;

export function makeSnippet(content: string): string {
  return content.length > SNIPPET_CHARS ? `${content.slice(0, SNIPPET_CHARS)}...` : content;
}

export function newMemoryId(): string {
  return `memory-${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}

export function createMemoryRecord(
  draft: NewMemory,
  now: Date = new Date(),
  id: string = newMemoryId(),
): MemoryRecord {
  const stamp = now.toISOString();
  return {
    id,
    workspaceId: draft.workspaceId,
    title: draft.title,
    content: draft.content,
    snippet: makeSnippet(draft.content),
    tags: [...draft.tags],
    metadata: { ...draft.metadata },
    version: 1,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

/**
 * Apply an edit. Any revision bumps the version by one; a content change also
 * regenerates the snippet.
 */
export function reviseMemory(
  record: MemoryRecord,
  patch: MemoryPatch,
  now: Date = new Date(),
): MemoryRecord {
  const content = patch.content ?? record.content;
  return {
    ...record,
    title: patch.title ?? record.title,
    content,
    snippet: content !== record.content ? makeSnippet(content) : record.snippet,
    tags: patch.tags ? [...patch.tags] : record.tags,
    metadata: patch.metadata ? { ...record.metadata, ...patch.metadata } : record.metadata,
    version: record.version + 1,
    updatedAt: now.toISOString(),
  };
}

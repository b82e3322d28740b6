import { log } from "./logger.js";
import { sanitizeInjectedContent } from "./sanitize.js";
import type {
  ChatMessage,
  ChatRole,
  ContextBundle,
  InjectedMemoryBlock,
  MemoryRecord,
} from "./types.js";

export const TRUNCATION_MARKER = "[…truncated]";

export interface ContextBudget {
  maxMemories: number;
  maxMemoryChars: number;
  historyLimit: number;
  sanitize: boolean;
}

export const DEFAULT_CONTEXT_BUDGET: ContextBudget = {
  maxMemories: 5,
  maxMemoryChars: 1000,
  historyLimit: 5,
  sanitize: true,
};

export interface ContextInput {
  systemPrompt: string;
  /** Active injected memories, in caller order. */
  memories: MemoryRecord[];
  /** Chronological, oldest first. */
  history: ChatMessage[];
  userMessage: string;
}

function toBlock(memory: MemoryRecord, budget: ContextBudget): InjectedMemoryBlock {
  let body = memory.content;
  if (budget.sanitize) {
    const sanitized = sanitizeInjectedContent(body);
    if (!sanitized.clean) {
      log.warn(`context: redacted ${sanitized.violations.length} pattern(s) in memory ${memory.id}`);
      body = sanitized.text;
    }
  }

  if (body.length <= budget.maxMemoryChars) {
    return { memoryId: memory.id, title: memory.title, content: body, truncated: false };
  }
  return {
    memoryId: memory.id,
    title: memory.title,
    content: `${body.slice(0, budget.maxMemoryChars)}\n${TRUNCATION_MARKER}`,
    truncated: true,
  };
}

export function formatMemoriesBlock(blocks: InjectedMemoryBlock[]): string {
  const sections = blocks.map((b) => `### ${b.title}\n\n${b.content}`);
  return `## Injected Memories\n\n${sections.join("\n\n")}`;
}

/**
 * Merge instructions, injected memories, recent history and the new message
 * into one bundle that stays within the budget.
 */
export function assembleContext(
  input: ContextInput,
  budget: ContextBudget = DEFAULT_CONTEXT_BUDGET,
): ContextBundle {
  const memories = input.memories
    .slice(0, Math.max(0, budget.maxMemories))
    .map((m) => toBlock(m, budget));

  const limit = Math.max(0, budget.historyLimit);
  const history = limit === 0 ? [] : input.history.slice(-limit);

  const system =
    memories.length > 0
      ? `${input.systemPrompt}\n\n${formatMemoriesBlock(memories)}`
      : input.systemPrompt;

  return { system, memories, history, userMessage: input.userMessage };
}

export interface RoleContent {
  role: ChatRole;
  content: string;
}

/** system, then history, then the current user message. */
export function toChatMessages(bundle: ContextBundle): RoleContent[] {
  return [
    { role: "system", content: bundle.system },
    ...bundle.history.map((m) => ({ role: m.role, content: m.content })),
    { role: "user", content: bundle.userMessage },
  ];
}

import {
  FACT_PATTERNS,
  HIGH_KEYWORDS,
  classifyImportance,
  containsKeyword,
  generateTags,
  importanceScore,
  shouldPersist,
} from "./importance.js";
import type { Classification, ExtractionCandidate, ImportanceLevel, NewMemory } from "./types.js";

const MIN_FACT_CHARS = 10;
const TITLE_CHARS = 50;
const EXCHANGE_TITLE_CHARS = 40;

/**
 * Candidate facts from free text. Pattern hits come first (confidence medium),
 * then every sentence carrying a high-importance keyword (confidence high).
 * Overlapping candidates are kept; callers dedupe.
 */
export function extractFacts(text: string): ExtractionCandidate[] {
  const source = typeof text === "string" ? text : "";
  const facts: ExtractionCandidate[] = [];

  for (const pattern of FACT_PATTERNS) {
    const rx = new RegExp(pattern.source, "gi");
    for (const match of source.matchAll(rx)) {
      const span = match[0].trim();
      if (span.length > MIN_FACT_CHARS) {
        facts.push({ text: span, confidence: "medium", provenance: "pattern" });
      }
    }
  }

  for (const raw of source.split(".")) {
    const sentence = raw.trim();
    if (!sentence) continue;
    if (HIGH_KEYWORDS.some((k) => containsKeyword(sentence, k))) {
      facts.push({ text: sentence, confidence: "high", provenance: "keyword" });
    }
  }

  return facts;
}

export function classifyText(text: string): Classification {
  return {
    importance: classifyImportance(text),
    tags: generateTags(text),
    score: importanceScore(text),
    candidates: extractFacts(text),
  };
}

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export interface ExchangeContext {
  workspaceId: string;
  conversationId: string;
  modelUsed?: string;
}

export interface ExchangePlan {
  importance: ImportanceLevel;
  drafts: NewMemory[];
}

/**
 * Memories worth keeping from one user/assistant exchange: one per fact found
 * in the user message, plus the whole exchange when it is high importance.
 */
export function planExchangeMemories(
  userMessage: string,
  reply: string,
  context: ExchangeContext,
): ExchangePlan {
  const importance = classifyImportance(userMessage);
  if (!shouldPersist(importance)) return { importance, drafts: [] };

  const drafts: NewMemory[] = extractFacts(userMessage).map((fact) => ({
    workspaceId: context.workspaceId,
    title: clip(fact.text, TITLE_CHARS),
    content: fact.text,
    tags: generateTags(fact.text),
    metadata: {
      source: "user",
      autoExtracted: true,
      importance,
      importanceScore: importanceScore(fact.text),
      extractionType: fact.provenance,
      modelUsed: context.modelUsed ?? null,
      conversationId: context.conversationId,
    },
  }));

  if (importance === "high") {
    drafts.push({
      workspaceId: context.workspaceId,
      title: `Important: ${clip(userMessage, EXCHANGE_TITLE_CHARS)}`,
      content: `User: ${userMessage}\n\nAssistant: ${reply}`,
      tags: [...generateTags(`${userMessage} ${reply}`), "full-exchange", "high-importance"],
      metadata: {
        source: "exchange",
        autoExtracted: true,
        importance,
        modelUsed: context.modelUsed ?? null,
        conversationId: context.conversationId,
      },
    });
  }

  return { importance, drafts };
}

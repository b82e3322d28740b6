/**
 * Local importance heuristics.
 *
 * Decides whether an exchange is worth keeping, derives tags and a numeric
 * importance score. Pure functions over the input text: no I/O, no state.
 */

import type { ImportanceLevel } from "./types.js";

// ---------------------------------------------------------------------------
// Lexicons and patterns
// ---------------------------------------------------------------------------

/** Explicit requests to keep something. */
const SAVE_KEYWORDS = ["remember", "save", "store", "keep", "note"];

/** Preference and necessity words. */
export const HIGH_KEYWORDS = [
  "prefer",
  "like",
  "love",
  "hate",
  "dislike",
  "always",
  "never",
  "important",
  "critical",
  "must",
  "required",
  "need",
  "want",
  "remember",
  "note",
  "save",
  "store",
  "keep in mind",
];

const MEDIUM_KEYWORDS = [
  "usually",
  "often",
  "sometimes",
  "typically",
  "generally",
  "working on",
  "building",
  "creating",
  "developing",
  "use",
  "using",
  "utilize",
  "employ",
];

/** Words whose presence alone bumps the numeric score. */
const EMPHASIS_KEYWORDS = ["remember", "save", "important"];

/**
 * Factual statements, in evaluation order: identity, preference,
 * personal details, "working on X".
 */
export const FACT_PATTERNS: readonly RegExp[] = [
  /\b(?:I|we|user|team)\s+(?:am|is|are)\s+(.+)/i,
  /\b(?:I|we|user|team)\s+(?:prefer|like|love|use|need)\s+(.+)/i,
  /\b(?:my|our|the)\s+(?:name|email|phone|address|company)\s+(?:is|are)\s+(.+)/i,
  /\b(?:I|we)\s+(?:work|working|build|building|develop|developing)\s+(?:on|with|in)\s+(.+)/i,
];

const TAG_RULES: ReadonlyArray<{ tag: string; words: readonly string[] }> = [
  { tag: "preference", words: ["prefer", "like", "love", "favorite"] },
  { tag: "project", words: ["building", "working", "developing", "creating"] },
  { tag: "programming", words: ["python", "javascript", "java", "code", "programming"] },
  { tag: "design", words: ["design", "ui", "ux", "interface", "layout"] },
  { tag: "backend", words: ["api", "backend", "server", "database"] },
  { tag: "frontend", words: ["frontend", "react", "vue", "angular"] },
  { tag: "team", words: ["team", "colleague", "member", "collaborate"] },
  { tag: "important", words: ["important", "critical", "must", "required"] },
];

export const DEFAULT_TAG = "general";

// ---------------------------------------------------------------------------
// Matching helpers
// ---------------------------------------------------------------------------

const keywordPatterns = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Word-prefix match: "prefer" hits "prefers" and "preferences",
 * "use" does not hit "because".
 */
export function containsKeyword(text: string, keyword: string): boolean {
  let rx = keywordPatterns.get(keyword);
  if (!rx) {
    rx = new RegExp(`\\b${escapeRegExp(keyword).replace(/ /g, "\\s+")}`, "i");
    keywordPatterns.set(keyword, rx);
  }
  return rx.test(text);
}

function containsAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((k) => containsKeyword(text, k));
}

export function matchesFactPattern(text: string): boolean {
  return FACT_PATTERNS.some((rx) => rx.test(text));
}

export function wordCount(text: string): number {
  const trimmed = text.trim();
  return trimmed.length === 0 ? 0 : trimmed.split(/\s+/).length;
}

function asText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Coarse importance of a user message. Ordered rules, first match wins.
 */
export function classifyImportance(userMessage: string): ImportanceLevel {
  const text = asText(userMessage);

  if (containsAny(text, SAVE_KEYWORDS)) return "high";
  if (containsAny(text, HIGH_KEYWORDS)) return "high";
  if (containsAny(text, MEDIUM_KEYWORDS) || matchesFactPattern(text)) return "medium";

  const words = wordCount(text);
  if (words > 10) return "medium";
  if (words > 3) return "low";
  return "none";
}

export function shouldPersist(importance: ImportanceLevel): boolean {
  return importance !== "none";
}

export function generateTags(text: string): string[] {
  const source = asText(text);
  const tags = TAG_RULES.filter((rule) => containsAny(source, rule.words)).map((rule) => rule.tag);
  return tags.length > 0 ? tags : [DEFAULT_TAG];
}

/**
 * Numeric importance in [0, 1], rounded to two decimals.
 */
export function importanceScore(text: string): number {
  const source = asText(text);
  let score = 0.5;

  // Once per lexicon entry, not per occurrence.
  for (const keyword of HIGH_KEYWORDS) {
    if (containsKeyword(source, keyword)) score += 0.1;
  }

  if (containsAny(source, EMPHASIS_KEYWORDS)) score += 0.2;
  if (matchesFactPattern(source)) score += 0.1;

  const words = wordCount(source);
  if (words > 50) score += 0.1;
  else if (words > 20) score += 0.05;

  return Math.round(Math.min(1, score) * 100) / 100;
}

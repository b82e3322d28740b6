const INJECTION_PATTERNS: RegExp[] = [
  /ignore\s+(all\s+)?(previous|prior|above)\s+(instructions?|prompts?|context)/i,
  /forget\s+(everything|all|previous|what)/i,
  /new\s+(system\s+)?prompt:/i,
  /\[system\]/i,
  /<\s*system\s*>/i,
  /you\s+are\s+now\s+(?!called|named)/i,
  /disregard\s+(all\s+)?(previous|prior)/i,
  /override\s+(previous\s+)?(instructions?|prompt)/i,
  /do\s+not\s+(?:follow|obey)\s+(?:previous|prior|your)\s+instructions/i,
];

export const REDACTED_LINE = "[line removed: possible prompt injection]";

export type SanitizeResult = {
  clean: boolean;
  text: string;
  violations: string[];
};

/**
 * Redact lines of an injected memory that read like instructions to the model.
 * Other lines are kept verbatim.
 */
export function sanitizeInjectedContent(text: string): SanitizeResult {
  const source = typeof text === "string" ? text : "";
  const violations: string[] = [];

  const lines = source.split("\n").map((line) => {
    const hits = INJECTION_PATTERNS.filter((p) => p.test(line));
    if (hits.length === 0) return line;
    for (const hit of hits) {
      if (!violations.includes(hit.source)) violations.push(hit.source);
    }
    return REDACTED_LINE;
  });

  if (violations.length === 0) {
    return { clean: true, text: source, violations: [] };
  }
  return { clean: false, text: lines.join("\n"), violations };
}

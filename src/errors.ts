/**
 * A request that never produced an HTTP response (refused, reset, DNS).
 * Thrown by the provider HTTP helpers, turned into a `transportError` result
 * by the dispatch executor.
 */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}

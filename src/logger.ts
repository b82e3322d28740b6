export interface LoggerBackend {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

const PREFIX = "[memroute]";

let backend: LoggerBackend = console;
let debugEnabled = false;

function format(msg: string, args: unknown[]): string {
  if (args.length === 0) return `${PREFIX} ${msg}`;
  const rest = args
    .map((a) => (a instanceof Error ? a.message : typeof a === "string" ? a : JSON.stringify(a)))
    .join(" ");
  return `${PREFIX} ${msg} ${rest}`;
}

/**
 * Bind the host's logger. Debug lines are dropped unless `debug` is set.
 */
export function initLogger(next: LoggerBackend, debug: boolean): void {
  backend = next;
  debugEnabled = debug;
}

/** Toggle debug lines without replacing the bound backend. */
export function setDebugLogging(debug: boolean): void {
  debugEnabled = debug;
}

export const log = {
  info(msg: string, ...args: unknown[]): void {
    backend.info(format(msg, args));
  },
  warn(msg: string, ...args: unknown[]): void {
    backend.warn(format(msg, args));
  },
  error(msg: string, ...args: unknown[]): void {
    backend.error(format(msg, args));
  },
  debug(msg: string, ...args: unknown[]): void {
    if (!debugEnabled) return;
    const line = format(msg, args);
    if (backend.debug) backend.debug(line);
    else backend.info(line);
  },
};

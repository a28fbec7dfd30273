export interface LoggerBackend {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

const PREFIX = "[tiered-memory]";

let backend: LoggerBackend | null = null;
let debugEnabled = false;

/**
 * Install the sink for all log output. Safe to call more than once; the CLI
 * calls it again after the config (and its debug flag) has been parsed.
 */
export function initLogger(next: LoggerBackend, debug: boolean): void {
  backend = next;
  debugEnabled = debug;
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? `${arg.name}: ${arg.message}`;
  if (typeof arg === "string") return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

function format(msg: string, args: unknown[]): string {
  const tail = args.map(formatArg).join(" ");
  return tail.length > 0 ? `${PREFIX} ${msg} ${tail}` : `${PREFIX} ${msg}`;
}

export const log = {
  debug(msg: string, ...args: unknown[]): void {
    if (!debugEnabled || !backend) return;
    backend.debug(format(msg, args));
  },
  info(msg: string, ...args: unknown[]): void {
    backend?.info(format(msg, args));
  },
  warn(msg: string, ...args: unknown[]): void {
    backend?.warn(format(msg, args));
  },
  error(msg: string, ...args: unknown[]): void {
    backend?.error(format(msg, args));
  },
};

/**
 * Console output for the server. `installGlobalLogger` patches console so a
 * leading `[tag]` picks both the colour of the tag and the level that
 * LOG_LEVEL is checked against.
 */

const ANSI = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  fg: {
    blue: "\x1b[34m",
    cyan: "\x1b[36m",
    green: "\x1b[32m",
    magenta: "\x1b[35m",
    yellow: "\x1b[33m",
    red: "\x1b[31m",
  },
} as const;

export type LogLevel = "error" | "warn" | "info" | "debug";

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const TAG_COLORS = new Map<string, string>([
  ["render", ANSI.fg.cyan],
  ["xrl", ANSI.fg.green],
  ["routes", ANSI.fg.magenta],
  ["info", ANSI.fg.blue],
  ["warn", ANSI.fg.yellow],
  ["error", ANSI.fg.red],
  ["debug", ANSI.dim],
]);

const LEADING_TAG = /^\[(\w+)\]/;

/** Colour a known leading tag; lines already carrying ANSI codes pass through. */
export function colorizeKnownTag(line: string): string {
  if (line.includes("\x1b[")) return line;

  const match = LEADING_TAG.exec(line);
  const tag = match?.[1]?.toLowerCase();
  const color = tag === undefined ? undefined : TAG_COLORS.get(tag);
  if (tag === undefined || color === undefined) return line;

  return `${color}[${tag}]${ANSI.reset}${line.slice(tag.length + 2)}`;
}

export function resolveLevelFromTag(s: string): number {
  const tag = LEADING_TAG.exec(s)?.[1]?.toLowerCase();
  switch (tag) {
    case "error":
      return LEVELS.error;
    case "warn":
      return LEVELS.warn;
    case "debug":
      return LEVELS.debug;
    default:
      // [info], domain tags and untagged lines
      return LEVELS.info;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function currentLogLevel(env: NodeJS.ProcessEnv = process.env): number {
  const raw = (env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? LEVELS[raw] : LEVELS.info;
}

export function shouldEmit(
  args: unknown[],
  env: NodeJS.ProcessEnv = process.env
): boolean {
  if (args.length === 0) return true;
  const first = args[0];
  if (typeof first !== "string") return true;
  return resolveLevelFromTag(first) <= currentLogLevel(env);
}

function formatArgs(args: unknown[]): unknown[] {
  if (args.length === 0) return args;
  const [first, ...rest] = args;
  if (typeof first === "string") {
    return [colorizeKnownTag(first), ...rest];
  }
  return args;
}

let installed = false;

export function installGlobalLogger(): void {
  if (installed) return;
  installed = true;

  const origLog = console.log.bind(console);
  const origInfo = console.info ? console.info.bind(console) : origLog;
  const origWarn = console.warn.bind(console);
  const origError = console.error.bind(console);

  console.log = (...args: unknown[]) => {
    if (!shouldEmit(args)) return;
    origLog(...formatArgs(args));
  };
  console.info = (...args: unknown[]) => {
    if (!shouldEmit(args)) return;
    origInfo(...formatArgs(args));
  };
  console.warn = (...args: unknown[]) => {
    if (!shouldEmit(args)) return;
    origWarn(...formatArgs(args));
  };
  console.error = (...args: unknown[]) => {
    if (!shouldEmit(args)) return;
    origError(...formatArgs(args));
  };
}

// Tag helpers so call sites stay short
export const logInfo = (...args: unknown[]) => console.log("[info]", ...args);
export const logDebug = (...args: unknown[]) => console.log("[debug]", ...args);
export const logWarn = (...args: unknown[]) => console.warn("[warn]", ...args);
export const logError = (...args: unknown[]) =>
  console.error("[error]", ...args);

export const loggerColors = ANSI;

import process from "node:process";

export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  readonly level: LogLevel;
  error(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  debug(message: string, fields?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

const rank: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

function formatFields(fields: Record<string, unknown> | undefined): string {
  if (!fields) return "";
  const parts: string[] = [];
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue;
    parts.push(`${k}=${typeof v === "string" ? JSON.stringify(v) : String(v)}`);
  }
  return parts.length > 0 ? " " + parts.join(" ") : "";
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + "\n");
};

/**
 * Line-oriented logger: `[expose-rpc] <level> <message> k=v ...`.
 * Writes to stderr unless a sink is given.
 */
export function createLogger(opts: { level?: LogLevel; sink?: LogSink; prefix?: string } = {}): Logger {
  const level = opts.level ?? "warn";
  const sink = opts.sink ?? stderrSink;
  const prefix = opts.prefix ?? "expose-rpc";

  const emit = (at: Exclude<LogLevel, "silent">, message: string, fields?: Record<string, unknown>) => {
    if (rank[at] > rank[level]) return;
    sink(`[${prefix}] ${at} ${message}${formatFields(fields)}`);
  };

  return {
    level,
    error: (m, f) => emit("error", m, f),
    warn: (m, f) => emit("warn", m, f),
    info: (m, f) => emit("info", m, f),
    debug: (m, f) => emit("debug", m, f)
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });

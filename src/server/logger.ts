export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

export type Logger = {
  debug: (msg: string, ctx?: LogContext) => void;
  info: (msg: string, ctx?: LogContext) => void;
  warn: (msg: string, ctx?: LogContext) => void;
  error: (msg: string, ctx?: LogContext) => void;
  child: (bindings: LogContext) => Logger;
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function serializeCtx(ctx: LogContext): string {
  if (Object.keys(ctx).length === 0) return "";
  return ` ${JSON.stringify(ctx)}`;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function makeLogger(level: LogLevel, bindings: LogContext = {}): Logger {
  function log(method: LogLevel, msg: string, ctx?: LogContext): void {
    if (rank[method] < rank[level]) return;
    const merged = { ...bindings, ...ctx };
    const line = `[${new Date().toISOString()}] ${method.toUpperCase()} ${msg}${serializeCtx(merged)}`;
    // One line per record for log shipping.
    process.stdout.write(`${line}\n`);
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
    child: (extra) => makeLogger(level, { ...bindings, ...extra }),
  };
}

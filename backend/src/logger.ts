type Level = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

export interface Logger {
  child(ctx: LogContext): Logger;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: Level[] = ["debug", "info", "warn", "error"];

function isLevel(value: string | undefined): value is Level {
  return LEVELS.some((level) => level === value);
}

function resolveLevel(): Level | "silent" {
  const fromEnv = process.env.LOG_LEVEL;
  if (isLevel(fromEnv)) {
    return fromEnv;
  }
  // tests stay quiet unless LOG_LEVEL asks otherwise
  if (process.env.NODE_ENV === "test" || process.env.VITEST) {
    return "silent";
  }
  return "info";
}

function serializeValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

function emit(level: Level, namespace: string, base: LogContext, msg: string, extra?: LogContext): void {
  const threshold = resolveLevel();
  if (threshold === "silent" || LEVELS.indexOf(level) < LEVELS.indexOf(threshold)) {
    return;
  }

  const ctx: LogContext = {};
  for (const [key, value] of Object.entries({ ...base, ...(extra || {}) })) {
    ctx[key] = serializeValue(value);
  }

  const ts = new Date().toISOString();
  const line =
    process.env.LOG_FORMAT === "json"
      ? JSON.stringify({ ts, level, namespace, msg, ...ctx })
      : `[${ts}] ${level.toUpperCase()} ${namespace} - ${msg}${
          Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : ""
        }`;

  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function getLogger(namespace: string, base: LogContext = {}): Logger {
  return {
    child: (ctx) => getLogger(namespace, { ...base, ...ctx }),
    debug: (msg, ctx) => emit("debug", namespace, base, msg, ctx),
    info: (msg, ctx) => emit("info", namespace, base, msg, ctx),
    warn: (msg, ctx) => emit("warn", namespace, base, msg, ctx),
    error: (msg, ctx) => emit("error", namespace, base, msg, ctx)
  };
}

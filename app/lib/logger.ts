import type { LogFormat, LogLevel } from "./config";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(name: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function serialize(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  return value;
}

/**
 * Structured console logger.
 *
 * json format writes one object per line:
 *   {"timestamp":"…","level":"info","logger":"projects","message":"…",…fields}
 * text format writes:
 *   <ISO> INFO [projects] message {"field":1}
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const format = options.format ?? "json";

  function write(level: LogLevel, message: string, fields?: LogFields): void {
    if (LEVEL_RANK[level] < threshold) return;

    const timestamp = new Date().toISOString();
    let line: string;
    if (format === "json") {
      const entry: LogFields = { timestamp, level, logger: name, message };
      for (const [k, v] of Object.entries(fields ?? {})) entry[k] = serialize(v);
      line = JSON.stringify(entry);
    } else {
      const extra =
        fields && Object.keys(fields).length > 0
          ? ` ${JSON.stringify(fields, (_k, v: unknown) => serialize(v))}`
          : "";
      line = `${timestamp} ${level.toUpperCase()} [${name}] ${message}${extra}`;
    }

    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  }

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childName) => createLogger(`${name}.${childName}`, options),
  };
}

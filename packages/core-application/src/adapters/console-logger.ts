import type { LogFields, Logger, LogLevel } from "../ports/logger";

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export type LogSink = Pick<Console, "error" | "warn" | "info" | "debug">;

export type ConsoleLoggerOptions = {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
  now?: () => Date;
};

function formatFields(fields?: LogFields): string {
  if (!fields || Object.keys(fields).length === 0) return "";
  return ` ${JSON.stringify(fields, (_key, value: unknown) =>
    value instanceof Error ? { name: value.name, message: value.message } : value
  )}`;
}

/** Prints `[timestamp] [LEVEL] [scope] message {fields}`. */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(private readonly options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.sink = options.sink ?? console;
    this.now = options.now ?? (() => new Date());
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write("warn", message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write("info", message, fields);
  }

  debug(message: string, fields?: LogFields): void {
    this.write("debug", message, fields);
  }

  child(scope: string): Logger {
    const parent = this.options.scope;
    return new ConsoleLogger({ ...this.options, scope: parent ? `${parent}.${scope}` : scope });
  }

  private write(level: LogLevel, message: string, fields?: LogFields) {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) return;

    const scope = this.options.scope ? ` [${this.options.scope}]` : "";
    const line = `[${this.now().toISOString()}] [${level.toUpperCase()}]${scope} ${message}${formatFields(fields)}`;
    this.sink[level](line);
  }
}

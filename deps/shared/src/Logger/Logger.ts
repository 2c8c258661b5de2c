export const logLevels = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const;

export type LogLevel = (typeof logLevels)[number];
export type RecordLevel = Exclude<LogLevel, "silent">;

export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogRecord = {
  level: RecordLevel;
  time: string;
  path: string[];
  event: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport {
  write(record: LogRecord): void;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 三種呼叫方式：
 * - `logger.info("訊息")`
 * - `logger.info({ event: "done" }, "訊息")`
 * - ``logger.info({ count })`共 ${count} 項` ``
 */
export interface LogMethod {
  (msg: string): void;
  (context: LogContext, msg: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 延伸命名空間，並合併 context */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變命名空間 */
  append(context: LogContext): Logger;
  attachTransport(transport: LogTransport): void;
}

export type EmojiMap = Partial<Record<string, string>>;

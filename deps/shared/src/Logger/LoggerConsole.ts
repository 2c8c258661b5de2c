import { format } from "date-fns";
import kleur from "kleur";

import type {
  EmojiMap,
  LogContext,
  LogLevel,
  LogMethod,
  LogRecord,
  LogTransport,
  Logger,
  RecordLevel,
  TemplateLog,
} from "./Logger";

const levelOrder: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
};

export type LoggerConsoleOptions = {
  transports?: LogTransport[];
  /** false 時只寫入 transports */
  console?: boolean;
};

export class LoggerConsole implements Logger {
  readonly trace: LogMethod = this.buildMethod("trace");
  readonly debug: LogMethod = this.buildMethod("debug");
  readonly info: LogMethod = this.buildMethod("info");
  readonly warn: LogMethod = this.buildMethod("warn");
  readonly error: LogMethod = this.buildMethod("error");

  private readonly transports: LogTransport[];
  private readonly consoleEnabled: boolean;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[],
    private readonly context: LogContext,
    private readonly emojiMap: EmojiMap,
    options: LoggerConsoleOptions = {}
  ) {
    this.transports = options.transports ?? [];
    this.consoleEnabled = options.console ?? true;
  }

  extend(name: string, context: LogContext = {}): Logger {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      { transports: this.transports, console: this.consoleEnabled }
    );
  }

  append(context: LogContext): Logger {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      { transports: this.transports, console: this.consoleEnabled }
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  private buildMethod(level: RecordLevel): LogMethod {
    const logger = this;
    function log(msg: string): void;
    function log(context: LogContext, msg: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      contextOrMsg?: LogContext | string,
      msg?: string
    ): TemplateLog | void {
      if (typeof contextOrMsg === "string") {
        logger.write(level, {}, contextOrMsg, contextOrMsg);
        return;
      }
      const context = contextOrMsg ?? {};
      if (msg !== undefined) {
        logger.write(level, context, msg, msg);
        return;
      }
      return (strings: TemplateStringsArray, ...values: unknown[]) => {
        const plain = strings.reduce(
          (acc, str, i) => acc + str + (i < values.length ? String(values[i]) : ""),
          ""
        );
        const colored = strings.reduce(
          (acc, str, i) =>
            acc + str + (i < values.length ? kleur.green(String(values[i])) : ""),
          ""
        );
        const valueContext = Object.fromEntries(
          values.map((value, i) => [`__${i}`, value])
        );
        logger.write(level, { ...context, ...valueContext }, plain, colored);
      };
    }
    return log;
  }

  private write(
    level: RecordLevel,
    callContext: LogContext,
    msg: string,
    displayMsg: string
  ) {
    if (levelOrder[level] < levelOrder[this.level]) return;

    const { event: callEvent, emoji: callEmoji } = callContext;
    const merged: LogContext = { ...this.context, ...callContext };
    const { event, emoji, error, ...rest } = merged;
    const eventName = event ?? level;

    const icon =
      callEmoji ??
      (callEvent ? this.emojiMap[callEvent] : undefined) ??
      emoji ??
      this.emojiMap[eventName] ??
      this.emojiMap[level] ??
      "";

    const err = error instanceof Error ? error : undefined;
    const extra: Record<string, unknown> =
      error !== undefined && !err ? { ...rest, error } : rest;

    const record: LogRecord = {
      level,
      time: new Date().toISOString(),
      path: this.path,
      event: eventName,
      msg,
      context: extra,
      err: err
        ? { name: err.name, message: err.message, stack: err.stack }
        : undefined,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }

    if (!this.consoleEnabled) return;

    const label = [...this.path, eventName].join(":");
    const json = Object.keys(extra).length > 0 ? ` ${safeJson(extra)}` : "";
    const line = `${kleur.gray(format(new Date(), "HH:mm:ss"))} ${icon} ${label}: ${displayMsg}${json}`;
    const stack = err?.stack ? `\n${err.stack}` : "";

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line + stack);
        break;
    }
  }
}

function safeJson(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

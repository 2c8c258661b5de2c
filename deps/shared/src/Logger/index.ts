import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";

import type { EmojiMap, Logger } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";

export * from "./Logger";
export { LoggerConsole, type LoggerConsoleOptions } from "./LoggerConsole";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

export const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
        t.Literal("silent"),
      ],
      { default: "info" }
    ),
  })
);

export function createDefaultLoggerFromEnv(): Logger {
  const { LOG_LEVEL } = getLoggerConfig();
  return new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
}

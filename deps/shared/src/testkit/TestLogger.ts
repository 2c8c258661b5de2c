import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv, envBoolean } from "../ConfigFactory";
import {
  type LogRecord,
  type LogTransport,
  type Logger,
  LoggerConsole,
  defaultEmojiMap,
} from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOGGER_CONSOLE_OUTPUT: t.Optional(envBoolean()),
  })
);

/** 收集所有 log record，供測試斷言 */
export class LogTransportMemory implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  byLevel(level: LogRecord["level"]) {
    return this.records.filter((r) => r.level === level);
  }
}

/**
 * 測試用 logger：預設不輸出到 console。
 * 設定 TEST_LOGGER_CONSOLE_OUTPUT=true 可看到輸出。
 */
export function buildTestLogger(transport?: LogTransport): Logger {
  const { TEST_LOGGER_CONSOLE_OUTPUT } = getTestLoggerConfig();
  return new LoggerConsole("trace", ["test"], {}, defaultEmojiMap, {
    transports: transport ? [transport] : [],
    console: TEST_LOGGER_CONSOLE_OUTPUT ?? false,
  });
}

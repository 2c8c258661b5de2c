import {
  type Static,
  type TObject,
  Type as t,
} from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * 以 typebox schema 讀取環境變數。
 * 只取 schema 宣告的 key，空字串視為未設定；轉型後驗證失敗會拋出 ConfigError。
 */
export function buildConfigFactoryEnv<T extends TObject>(
  schema: T,
  env: Record<string, string | undefined> = process.env
): () => Static<T> {
  return () => {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const converted = Value.Convert(schema, Value.Default(schema, picked));
    if (!Value.Check(schema, converted)) {
      const first = Value.Errors(schema, converted).First();
      throw new ConfigError(
        first
          ? `環境變數 ${first.path.replace(/^\//, "")} 不合法: ${first.message}`
          : "環境變數不合法"
      );
    }
    return converted;
  };
}

/** "true" / "false" / "1" / "0" */
export function envBoolean(options?: { default?: boolean }) {
  return t.Boolean(options);
}

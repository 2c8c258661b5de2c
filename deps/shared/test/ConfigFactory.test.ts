import { Type as t } from "@sinclair/typebox";
import { describe, expect, test } from "vitest";

import {
  ConfigError,
  buildConfigFactoryEnv,
  envBoolean,
} from "~shared/ConfigFactory";

const schema = t.Object({
  FLAG: t.Optional(envBoolean()),
  COUNT: t.Number({ default: 3 }),
});

describe("buildConfigFactoryEnv", () => {
  test("轉型並套用預設值", () => {
    const getConfig = buildConfigFactoryEnv(schema, { FLAG: "true" });
    expect(getConfig()).toEqual({ FLAG: true, COUNT: 3 });
  });

  test("空字串視為未設定", () => {
    const getConfig = buildConfigFactoryEnv(schema, { FLAG: "", COUNT: "7" });
    expect(getConfig()).toEqual({ COUNT: 7 });
  });

  test("只讀取 schema 宣告的 key", () => {
    const getConfig = buildConfigFactoryEnv(schema, { OTHER: "x" });
    expect(getConfig()).toEqual({ COUNT: 3 });
  });

  test("無法轉型時拋出 ConfigError", () => {
    const getConfig = buildConfigFactoryEnv(schema, { COUNT: "abc" });
    expect(() => getConfig()).toThrow(ConfigError);
  });
});

import { type Static, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { ExtraTypeSchema, type ExtraType } from "@/types";

import namingDefaults from "./naming-defaults.json";

export const ExtraRuleTypeSchema = t.Union([
  t.Literal("filename"),
  t.Literal("suffix"),
  t.Literal("regex"),
  t.Literal("directoryName"),
]);
export type ExtraRuleType = Static<typeof ExtraRuleTypeSchema>;

export const NamingOptionsInputSchema = t.Object({
  videoFileExtensions: t.Array(t.String()),
  cleanStrings: t.Array(t.String()),
  cleanDateTimes: t.Array(t.String()),
  stackingRules: t.Array(
    t.Object({
      pattern: t.String({ description: "需有 filename 與 number 具名群組" }),
      isNumerical: t.Boolean(),
    })
  ),
  extraRules: t.Array(
    t.Object({
      type: ExtraRuleTypeSchema,
      token: t.String(),
      extraType: ExtraTypeSchema,
    })
  ),
  resolutionPattern: t.String(),
  movieVersionPattern: t.String(),
  episodeVersionPattern: t.String({
    description: "需有 base 與 version 具名群組，bracketVersion 可選",
  }),
});
export type NamingOptionsInput = Static<typeof NamingOptionsInputSchema>;

export const NamingOptionsOverridesSchema = t.Partial(NamingOptionsInputSchema);
export type NamingOptionsOverrides = Static<typeof NamingOptionsOverridesSchema>;

export type StackingRule = {
  readonly pattern: RegExp;
  readonly isNumerical: boolean;
};

export type ExtraRule = {
  readonly type: ExtraRuleType;
  readonly token: string;
  readonly extraType: ExtraType;
  /** 只有 type = "regex" 時存在 */
  readonly pattern?: RegExp;
};

/**
 * 編譯後的命名規則。程式啟動時建立一次，之後以參考傳遞，不可變更。
 * 所有 RegExp 都不帶 g flag，沒有 lastIndex 狀態。
 */
export type NamingOptions = {
  readonly videoFileExtensions: ReadonlySet<string>;
  readonly cleanStrings: readonly RegExp[];
  readonly cleanDateTimes: readonly RegExp[];
  readonly stackingRules: readonly StackingRule[];
  readonly extraRules: readonly ExtraRule[];
  /** 1080p、720i 這類解析度標記 */
  readonly resolution: RegExp;
  /** 電影檔名去掉資料夾名稱後的 [版本] 標記 */
  readonly movieVersion: RegExp;
  /** 集數檔名的 " - 版本" 或 " - [版本]" 後綴 */
  readonly episodeVersion: RegExp;
};

export type NamingOptionsError =
  | { type: "READ_FAILED"; message: string }
  | { type: "INVALID_JSON"; message: string }
  | { type: "INVALID_SCHEMA"; message: string }
  | { type: "INVALID_PATTERN"; message: string };

function loadDefaults(): NamingOptionsInput {
  if (!Value.Check(NamingOptionsInputSchema, namingDefaults)) {
    const first = Value.Errors(NamingOptionsInputSchema, namingDefaults).First();
    throw new Error(`naming-defaults.json 格式錯誤: ${first?.path} ${first?.message}`);
  }
  return namingDefaults;
}

export const defaultNamingInput: NamingOptionsInput = loadDefaults();

function compile(pattern: string) {
  return new RegExp(pattern, "i");
}

/** 加上空的選擇分支讓 exec("") 必定成功，groups 便會列出所有具名群組 */
function groupNamesOf(pattern: RegExp) {
  return Object.keys(new RegExp(`${pattern.source}|`).exec("")?.groups ?? {});
}

function compileWithGroups(
  pattern: string,
  required: readonly string[],
  field: string
) {
  const regex = compile(pattern);
  const present = new Set(groupNamesOf(regex));
  const missing = required.filter((name) => !present.has(name));
  if (missing.length > 0) {
    throw new Error(`${field} 缺少具名群組: ${missing.join(", ")}`);
  }
  return regex;
}

export function createNamingOptions(
  overrides: NamingOptionsOverrides = {}
): NamingOptions {
  const input: NamingOptionsInput = { ...defaultNamingInput, ...overrides };
  return Object.freeze({
    videoFileExtensions: new Set(
      input.videoFileExtensions.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    ),
    cleanStrings: Object.freeze(input.cleanStrings.map(compile)),
    cleanDateTimes: Object.freeze(input.cleanDateTimes.map(compile)),
    stackingRules: Object.freeze(
      input.stackingRules.map((r) => ({
        pattern: compileWithGroups(
          r.pattern,
          ["filename", "number"],
          "stackingRules"
        ),
        isNumerical: r.isNumerical,
      }))
    ),
    extraRules: Object.freeze(
      input.extraRules.map((r) =>
        r.type === "regex" ? { ...r, pattern: compile(r.token) } : { ...r }
      )
    ),
    resolution: compile(input.resolutionPattern),
    movieVersion: compile(input.movieVersionPattern),
    episodeVersion: compileWithGroups(
      input.episodeVersionPattern,
      ["base", "version"],
      "episodeVersionPattern"
    ),
  });
}

/**
 * 讀取 JSON 覆寫檔並編譯。只需列出要覆寫的欄位，其餘沿用預設值。
 */
export async function loadNamingOptions(
  filePath: string
): Promise<Result<NamingOptions, NamingOptionsError>> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (e) {
    return err({
      type: "READ_FAILED",
      message: e instanceof Error ? e.message : String(e),
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    return err({
      type: "INVALID_JSON",
      message: `${path.basename(filePath)}: ${e instanceof Error ? e.message : String(e)}`,
    });
  }

  if (!Value.Check(NamingOptionsOverridesSchema, raw)) {
    const first = Value.Errors(NamingOptionsOverridesSchema, raw).First();
    return err({
      type: "INVALID_SCHEMA",
      message: first ? `${first.path}: ${first.message}` : "格式不符",
    });
  }

  try {
    return ok(createNamingOptions(raw));
  } catch (e) {
    return err({
      type: "INVALID_PATTERN",
      message: e instanceof Error ? e.message : String(e),
    });
  }
}

export function isVideoFile(filePath: string, options: NamingOptions) {
  return options.videoFileExtensions.has(path.extname(filePath).toLowerCase());
}

import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";
import { type Result, err, ok } from "~shared/utils/Result";

import { type MediaKind, MediaKindSchema } from "@/types";

/** CLI 的預設值，可被命令列參數覆寫 */
export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    VIDEO_MEDIA_KIND: t.Optional(MediaKindSchema),
    VIDEO_MULTI_VERSION: envBoolean({ default: true }),
    VIDEO_PARSE_NAME: envBoolean({ default: true }),
    VIDEO_LIBRARY_ROOT: t.Optional(t.String()),
    VIDEO_NAMING_FILE: t.Optional(t.String()),
  })
);

export type MediaKindError = {
  type: "UNSUPPORTED_MEDIA_KIND";
  message: string;
};

export function parseMediaKind(
  value: string | undefined
): Result<MediaKind | undefined, MediaKindError> {
  if (value === undefined || value === "") return ok(undefined);
  const normalized = value.trim().toLowerCase();
  if (Value.Check(MediaKindSchema, normalized)) return ok(normalized);
  return err({
    type: "UNSUPPORTED_MEDIA_KIND",
    message: `不支援的媒體類型 "${value}"，可用：${MediaKindSchema.anyOf
      .map((s) => s.const)
      .join(", ")}`,
  });
}

/**
 * 從原始參數讀布林旗標，以最後出現的為準：
 * `--multi-version` → true、`--no-multi-version` → false、沒出現 → undefined
 */
export function readFlag(
  rawArgs: readonly string[],
  name: string
): boolean | undefined {
  let value: boolean | undefined;
  for (const arg of rawArgs) {
    if (arg === `--${name}`) value = true;
    else if (arg === `--no-${name}`) value = false;
  }
  return value;
}

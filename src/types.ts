import { type Static, Type as t } from "@sinclair/typebox";

export const ExtraTypeSchema = t.Union([
  t.Literal("unknown"),
  t.Literal("clip"),
  t.Literal("trailer"),
  t.Literal("behind-the-scenes"),
  t.Literal("deleted-scene"),
  t.Literal("interview"),
  t.Literal("scene"),
  t.Literal("sample"),
  t.Literal("theme-video"),
  t.Literal("featurette"),
  t.Literal("short"),
]);
export type ExtraType = Static<typeof ExtraTypeSchema>;

/** 未指定 = 不確定的媒體類型，與電影同樣處理 */
export const MediaKindSchema = t.Union([
  t.Literal("movies"),
  t.Literal("tvshows"),
  t.Literal("musicvideos"),
  t.Literal("homevideos"),
  t.Literal("mixed"),
]);
export type MediaKind = Static<typeof MediaKindSchema>;

export type VideoFile = {
  /** 完整路徑，在同一次解析中唯一 */
  path: string;
  isDirectory: boolean;
  /** 顯示名稱（解析後的標題） */
  name: string;
  year?: number;
  /** 有值代表是花絮、預告等額外內容 */
  extraType?: ExtraType;
  /** 副檔名（不含 .），資料夾沒有 */
  container?: string;
  /** 集數分組時從檔名擷取的版本標籤，例如 "1080p" */
  versionTag?: string;
};

/**
 * 一個邏輯上的影片項目。
 * - files 多於一個時代表多片段堆疊（cd1/cd2），此時 alternateVersions 必為空
 * - 版本分組後 files 只有一個主檔，其他版本放在 alternateVersions
 */
export type VideoItem = {
  name: string;
  year?: number;
  files: VideoFile[];
  alternateVersions: VideoFile[];
  extraType?: ExtraType;
};

export type FileSystemEntry = {
  fullPath: string;
  isDirectory: boolean;
};

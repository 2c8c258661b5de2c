import type { MediaKind, VideoFile, VideoItem } from "@/types";

export type VideoListResolveOptions = {
  /** 是否合併多版本，預設 true */
  supportMultiVersion?: boolean;
  /** 是否解析堆疊片段的檔名（年份、發行標記），預設 true */
  parseName?: boolean;
  libraryRoot?: string;
  /** "tvshows" 以集數分組，其餘（含未指定）以電影方式分組 */
  mediaKind?: MediaKind;
};

export interface VideoListResolver {
  /**
   * 將同一媒體項目下的影片檔整理成堆疊、獨立作品、多版本與額外內容。
   * 不讀取檔案內容，也不修改輸入的紀錄。
   */
  resolve(
    files: readonly VideoFile[],
    options?: VideoListResolveOptions
  ): VideoItem[];
}

export class UnsupportedMediaKindError extends Error {
  constructor(readonly mediaKind: unknown) {
    super(`不支援的媒體類型: ${String(mediaKind)}`);
    this.name = "UnsupportedMediaKindError";
  }
}

import type { VideoFile } from "@/types";

export type VideoFileResolveOptions = {
  /** 是否從檔名拆出年份並清除發行標記，預設 true */
  parseName?: boolean;
  /** 媒體庫根目錄，用於排除根目錄本身被當成額外內容資料夾 */
  libraryRoot?: string;
};

export interface VideoFileResolver {
  /**
   * 將路徑解析成 VideoFile。非影片副檔名的檔案回傳 undefined。
   */
  resolve(
    filePath: string,
    isDirectory: boolean,
    options?: VideoFileResolveOptions
  ): VideoFile | undefined;
}

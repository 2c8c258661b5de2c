import type { VideoItem } from "@/types";

export interface VersionGrouper {
  /**
   * 將同一作品的不同版本（解析度、剪輯版）合併成一個主檔加替代版本。
   * 無法分組時回傳原本的清單。
   */
  group(items: VideoItem[]): VideoItem[];
}

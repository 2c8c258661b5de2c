import type { Result } from "~shared/utils/Result";

import type { FileSystemEntry } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 只保留這些副檔名的檔案，空陣列表示不過濾 */
  allowExts?: Iterable<string>;
  /** 是否一併回傳資料夾，預設 false */
  includeDirectories?: boolean;
};

export interface FileSystemScanner {
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<FileSystemEntry[], ScanError>>;
}

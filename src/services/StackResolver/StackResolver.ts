import type { FileSystemEntry } from "@/types";

export interface StackResolver {
  /**
   * 從檔案與資料夾清單找出多片段堆疊（cd1/cd2、disc1/disc2、part A/B）。
   * 少於兩片的不算堆疊。
   */
  resolve(entries: readonly FileSystemEntry[]): FileStack[];
}

export class FileStack {
  constructor(
    readonly name: string,
    readonly isDirectoryStack: boolean,
    readonly files: readonly string[]
  ) {}

  /** 路徑不分大小寫比較，且檔案／資料夾類型必須一致 */
  containsFile(filePath: string, isDirectory: boolean) {
    if (!filePath || this.isDirectoryStack !== isDirectory) return false;
    const lower = filePath.toLowerCase();
    return this.files.some((f) => f.toLowerCase() === lower);
  }
}

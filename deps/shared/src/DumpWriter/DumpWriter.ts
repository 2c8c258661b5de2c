export interface DumpWriter {
  /** 將資料輸出成 JSON 報告，回傳寫入的檔案路徑 */
  dump(name: string, data: unknown): Promise<string>;
}

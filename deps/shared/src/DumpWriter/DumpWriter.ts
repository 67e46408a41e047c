export interface DumpWriter {
  /**
   * 將資料寫成 JSON 報告檔，回傳寫入的路徑。
   */
  dump(name: string, data: unknown): Promise<string>;
}

import type { Result } from "~shared/utils/Result";

import type { FileIssue, PhotoFile } from "@/types";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 空陣列或未指定時不過濾副檔名 */
  allowExts?: readonly string[];
  /** 只保留修改日期（不含時間）在此日期當天或之後的檔案 */
  after?: Date;
};

export interface ScanResult {
  /** 依完整路徑排序 */
  files: PhotoFile[];
  /** 讀取失敗而略過的檔案或子資料夾 */
  issues: FileIssue[];
}

export interface FileSystemScanner {
  /**
   * 每次呼叫都重新讀取檔案系統。
   * 根目錄無法讀取時回傳 SCAN_FAILED；個別檔案失敗只記錄在 issues。
   */
  scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<ScanResult, ScanError>>;
}

import type { Result } from "~shared/utils/Result";

import type { FileIssue } from "@/types";

import type { OrganizeReport } from "./OrganizeService";

export interface PhotoImportService {
  /**
   * 從來源（例如 SD 卡）遞迴找出相片，依週次複製到 `Week N` 資料夾，
   * 需要時再逐週整理。來源無法讀取時回傳錯誤，且不會改動任何檔案。
   */
  import(
    source: string,
    options: ImportOptions
  ): Promise<Result<ImportReport, ImportError>>;
}

export type ImportOptions = {
  destinationRoot: string;
  /** 只保留與起算日同一個星期幾的檔案 */
  weekly?: boolean;
  after?: Date;
  organize?: boolean;
  prefix?: string;
  dryRun?: boolean;
};

export type ImportError = {
  type: "SCAN_FAILED";
  message: string;
};

export interface ImportWeekSummary {
  weekIndex: number;
  weekNumber: number;
  /** yyyy-MM-dd */
  representativeDate: string;
  directory: string;
  copied: number;
  failed: number;
}

export interface ImportReport {
  source: string;
  destinationRoot: string;
  dryRun: boolean;
  /** 副檔名與 after 過濾後的數量 */
  scanned: number;
  /** weekly 過濾後的數量 */
  filtered: number;
  weeks: ImportWeekSummary[];
  copied: number;
  failed: number;
  issues: FileIssue[];
  organized: OrganizeReport[];
}

import type { Result } from "~shared/utils/Result";

import type { FileIssue, PhotoCategory, PhotoFile } from "@/types";

export interface OrganizeService {
  /**
   * 掃描資料夾（不遞迴），把 JPEG 移到 JPG/、RAW 移到 RAW/。
   * 資料夾無法讀取時回傳錯誤，且不會改動任何檔案。
   */
  organize(
    directory: string,
    options?: OrganizeOptions
  ): Promise<Result<OrganizeReport, OrganizeError>>;

  /**
   * 對已知的檔案清單執行分類與搬移（不掃描）。
   */
  organizeFiles(
    directory: string,
    files: readonly PhotoFile[],
    options?: OrganizeOptions
  ): Promise<OrganizeReport>;
}

export type OrganizeOptions = {
  prefix?: string;
  dryRun?: boolean;
};

export type OrganizeError = {
  type: "SCAN_FAILED";
  message: string;
};

export type OrganizeMove = {
  from: string;
  to: string;
  category: PhotoCategory;
  sequence: number;
};

export type CategoryStats = { moved: number; failed: number };

export interface OrganizeReport {
  directory: string;
  dryRun: boolean;
  prefix?: string;
  found: Record<PhotoCategory, number>;
  /** dry-run 時為預計可搬移的數量 */
  moved: number;
  failed: number;
  byCategory: Record<PhotoCategory, CategoryStats>;
  /** 依計畫順序 */
  moves: OrganizeMove[];
  issues: FileIssue[];
}

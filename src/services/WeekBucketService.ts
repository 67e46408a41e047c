import type { FileIssue, PhotoFile } from "@/types";

export interface WeekBucketService {
  readonly epoch: Date;
  /** 起算日之後經過的完整週數，起算日之前為負數 */
  weekIndex(date: Date): number;
  /** 該週的代表日 = 起算日 + weekIndex × 7 天 */
  representativeDate(weekIndex: number): Date;
  /** 與起算日同一個星期幾 */
  isCadenceDay(date: Date): boolean;
  /** 依修改日期分週；早於起算日的檔案排除並記錄 BEFORE_EPOCH */
  bucket(files: readonly PhotoFile[]): WeekBucketResult;
}

export interface WeekBucket {
  weekIndex: number;
  /** 對外顯示的週次 = weekIndex + 1 */
  weekNumber: number;
  representativeDate: Date;
  files: PhotoFile[];
}

export interface WeekBucketResult {
  /** 依 weekIndex 遞增 */
  buckets: WeekBucket[];
  issues: FileIssue[];
}

import type { PhotoFile } from "@/types";

export interface SequenceService {
  /**
   * 依相機流水號排序並編號（1 起算）。
   * 沒有 prefix 時 targetName 維持原檔名。
   */
  buildPlan(files: readonly PhotoFile[], prefix?: string): RenamePlan;
}

export type RenamePlan = RenameEntry[];

export type RenameEntry = {
  file: PhotoFile;
  targetName: string;
  /** 1..N，無缺號、無重複 */
  sequence: number;
};

import type { Result } from "~shared/utils/Result";

export type FileOperationError = {
  type: "TARGET_EXISTS" | "MOVE_FAILED" | "COPY_FAILED" | "MKDIR_FAILED";
  message: string;
};

/**
 * 所有會改動檔案系統的操作。皆不覆蓋既有檔案。
 */
export interface FileOperator {
  /** 已存在時不做事 */
  ensureDir(dir: string): Promise<Result<void, FileOperationError>>;
  move(from: string, to: string): Promise<Result<void, FileOperationError>>;
  /** 保留來源的修改時間 */
  copy(from: string, to: string): Promise<Result<void, FileOperationError>>;
  exists(p: string): Promise<boolean>;
}

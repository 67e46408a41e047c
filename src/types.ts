export type Category = "JPEG" | "RAW" | "UNKNOWN";

export type PhotoCategory = Exclude<Category, "UNKNOWN">;

export const photoCategories: readonly PhotoCategory[] = ["JPEG", "RAW"];

/**
 * 掃描當下的檔案快照，建立後不再重新讀取。
 */
export type PhotoFile = {
  fullPath: string;
  fileName: string;
  /** 小寫、含點，例如 ".jpg" */
  extension: string;
  /** 檔名中第一段數字；沒有數字時為 undefined */
  sequenceKey?: bigint;
  modifiedAt: Date;
};

export type FileIssueType =
  | "READ_FAILED"
  | "TARGET_EXISTS"
  | "MOVE_FAILED"
  | "COPY_FAILED"
  | "MKDIR_FAILED"
  | "BEFORE_EPOCH";

export interface FileIssue {
  originPath: string;
  targetPath?: string;
  type: FileIssueType;
  message: string;
}

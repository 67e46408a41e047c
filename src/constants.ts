export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const rawExtensions = [".cr3"] as const;

export const photoExtensions = [...jpgExtensions, ...rawExtensions] as const;

/** 分類對應的子資料夾名稱（大小寫固定） */
export const categoryDirectories = {
  JPEG: "JPG",
  RAW: "RAW",
} as const;

/** 週次起算日：2024-11-06（星期三） */
export const defaultWeekEpoch = "2024-11-06";

export const dateArgFormat = "yyyy-MM-dd";

export const sequenceDigits = 4;

import path from "node:path";

import { categoryDirectories, jpgExtensions, rawExtensions } from "@/constants";
import type { Category, PhotoCategory } from "@/types";

const digitsRegex = /\d+/;

/**
 * 取出檔名（不含副檔名）中第一段連續數字。
 * 以 bigint 保存，位數再長也不會失去精度。
 *
 *   IMG_1234.JPG   → 1234n
 *   DSC05678.cr3   → 5678n
 *   2024_trip_7.jpg → 2024n
 *   cover.jpg      → undefined
 */
export function parseSequenceNumber(fileName: string): bigint | undefined {
  const stem = path.basename(fileName, path.extname(fileName));
  const match = digitsRegex.exec(stem);
  if (!match) return undefined;
  return BigInt(match[0]);
}

export function normalizeExtension(fileName: string) {
  return path.extname(fileName).toLowerCase();
}

export function classify(fileName: string): Category {
  const ext = normalizeExtension(fileName);
  if (jpgExtensions.some((e) => e === ext)) return "JPEG";
  if (rawExtensions.some((e) => e === ext)) return "RAW";
  return "UNKNOWN";
}

export function categoryDirectory(category: PhotoCategory) {
  return categoryDirectories[category];
}

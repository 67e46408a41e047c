import { sequenceDigits } from "@/constants";
import type { PhotoFile } from "@/types";
import { compareText } from "@/utils/helper";

import type { RenamePlan, SequenceService } from "./SequenceService";

type Indexed = { file: PhotoFile; scanIndex: number };

/**
 * 排序規則：
 * 1. 有流水號者依數字遞增，同號再比檔名
 * 2. 沒有流水號者排在最後，維持掃描順序
 *
 *   [IMG_23.jpg, IMG_5.jpg, IMG_47.jpg] + "trip"
 *     → IMG_5 → trip-0001.jpg, IMG_23 → trip-0002.jpg, IMG_47 → trip-0003.jpg
 */
export class SequenceServiceDefault implements SequenceService {
  buildPlan(files: readonly PhotoFile[], prefix?: string): RenamePlan {
    const sorted = files
      .map((file, scanIndex): Indexed => ({ file, scanIndex }))
      .sort(compareIndexed);

    return sorted.map(({ file }, i) => {
      const sequence = i + 1;
      const targetName = prefix
        ? `${prefix}-${String(sequence).padStart(sequenceDigits, "0")}${file.extension.toLowerCase()}`
        : file.fileName;
      return { file, targetName, sequence };
    });
  }
}

function compareIndexed(a: Indexed, b: Indexed) {
  const ka = a.file.sequenceKey;
  const kb = b.file.sequenceKey;
  if (ka !== undefined && kb !== undefined) {
    if (ka !== kb) return ka < kb ? -1 : 1;
    const byName = compareText(a.file.fileName, b.file.fileName);
    if (byName !== 0) return byName;
    return a.scanIndex - b.scanIndex;
  }
  if (ka !== undefined) return -1;
  if (kb !== undefined) return 1;
  return a.scanIndex - b.scanIndex;
}

import { addDays, differenceInCalendarDays, format, startOfDay } from "date-fns";

import { dateArgFormat } from "@/constants";
import type { FileIssue, PhotoFile } from "@/types";

import type {
  WeekBucket,
  WeekBucketResult,
  WeekBucketService,
} from "./WeekBucketService";

export function weekIndex(date: Date, epoch: Date) {
  return Math.floor(differenceInCalendarDays(date, epoch) / 7);
}

export function weekNumberOf(index: number) {
  return index + 1;
}

export function representativeDate(index: number, epoch: Date) {
  return addDays(startOfDay(epoch), index * 7);
}

export function isCadenceDay(date: Date, epoch: Date) {
  return date.getDay() === epoch.getDay();
}

/**
 * 例：epoch = 2024-11-06（三）
 *   2025-05-21（三）→ 196 天 → weekIndex 28 → Week 29
 *   2025-05-22（四）→ weekIndex 28，但不是 cadence day
 */
export class WeekBucketServiceDefault implements WeekBucketService {
  readonly epoch: Date;

  constructor(deps: { epoch: Date }) {
    this.epoch = startOfDay(deps.epoch);
  }

  weekIndex(date: Date) {
    return weekIndex(date, this.epoch);
  }

  representativeDate(index: number) {
    return representativeDate(index, this.epoch);
  }

  isCadenceDay(date: Date) {
    return isCadenceDay(date, this.epoch);
  }

  bucket(files: readonly PhotoFile[]): WeekBucketResult {
    const issues: FileIssue[] = [];
    const byIndex = files.reduce((map, file) => {
      const index = this.weekIndex(file.modifiedAt);
      if (index < 0) {
        issues.push({
          originPath: file.fullPath,
          type: "BEFORE_EPOCH",
          message: `日期 ${format(file.modifiedAt, dateArgFormat)} 早於起算日 ${format(this.epoch, dateArgFormat)}`,
        });
        return map;
      }
      let bucket = map.get(index);
      if (!bucket) {
        bucket = {
          weekIndex: index,
          weekNumber: weekNumberOf(index),
          representativeDate: this.representativeDate(index),
          files: [],
        };
        map.set(index, bucket);
      }
      bucket.files.push(file);
      return map;
    }, new Map<number, WeekBucket>());

    const buckets = [...byIndex.values()].sort(
      (a, b) => a.weekIndex - b.weekIndex
    );
    return { buckets, issues };
  }
}

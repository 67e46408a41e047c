import { format } from "date-fns";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, isOk, ok } from "~shared/utils/Result";

import { dateArgFormat, photoExtensions } from "@/constants";
import type { FileOperator } from "@/services/FileOperator";
import type { FileSystemScanner } from "@/services/FileSystemScanner";
import type { FileIssue, PhotoFile } from "@/types";
import { compareText } from "@/utils/helper";

import type { OrganizeReport, OrganizeService } from "./OrganizeService";
import type {
  ImportError,
  ImportOptions,
  ImportReport,
  ImportWeekSummary,
  PhotoImportService,
} from "./PhotoImportService";
import type { WeekBucket, WeekBucketService } from "./WeekBucketService";

export function weekDirectoryName(weekNumber: number) {
  return `Week ${weekNumber}`;
}

export class PhotoImportServiceDefault implements PhotoImportService {
  private readonly scanner: FileSystemScanner;
  private readonly weekBucketService: WeekBucketService;
  private readonly organizeService: OrganizeService;
  private readonly fileOperator: FileOperator;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    weekBucketService: WeekBucketService;
    organizeService: OrganizeService;
    fileOperator: FileOperator;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.weekBucketService = deps.weekBucketService;
    this.organizeService = deps.organizeService;
    this.fileOperator = deps.fileOperator;
    this.logger = deps.logger.extend("PhotoImportServiceDefault");
  }

  async import(
    source: string,
    options: ImportOptions
  ): Promise<Result<ImportReport, ImportError>> {
    const { destinationRoot, after, prefix } = options;
    const dryRun = options.dryRun ?? false;
    const logger = this.logger.extend("import", { source, dryRun });

    // 1) 遞迴掃描，after 在掃描時一併過濾
    const scanRes = await this.scanner.scan(source, {
      recursive: true,
      allowExts: photoExtensions,
      after,
    });
    if (isErr(scanRes)) {
      return err({ type: "SCAN_FAILED", message: scanRes.error.message });
    }
    const issues: FileIssue[] = [...scanRes.value.issues];
    for (const issue of scanRes.value.issues) {
      logger.warn({
        origin: issue.originPath,
      })`無法讀取 ${issue.originPath}，略過: ${issue.message}`;
    }
    const scanned = scanRes.value.files;
    logger.info({
      emoji: "🔎",
      count: scanned.length,
    })`找到 ${scanned.length} 個相片檔案`;

    // 2) 每週固定拍攝日過濾
    const candidates = options.weekly
      ? scanned.filter((f) => this.weekBucketService.isCadenceDay(f.modifiedAt))
      : scanned;
    if (options.weekly) {
      logger.info({
        emoji: "📅",
      })`每週模式：保留 ${candidates.length}/${scanned.length} 個檔案`;
    }

    // 3) 分週
    const { buckets, issues: bucketIssues } =
      this.weekBucketService.bucket(candidates);
    for (const issue of bucketIssues) {
      logger.info({ emoji: "⏭️" })`${path.basename(issue.originPath)} ${issue.message}，略過`;
    }
    issues.push(...bucketIssues);

    for (const bucket of buckets) {
      logger.info({
        emoji: "🗓️",
      })`Week ${bucket.weekNumber} (${format(bucket.representativeDate, dateArgFormat)}): ${bucket.files.length} 個檔案`;
    }

    // 4) 逐週複製，需要時整理
    const weeks: ImportWeekSummary[] = [];
    const organized: OrganizeReport[] = [];
    for (const bucket of buckets) {
      const weekDir = path.join(destinationRoot, weekDirectoryName(bucket.weekNumber));
      const copyRes = await this.copyBucket(bucket, weekDir, dryRun, logger);
      issues.push(...copyRes.issues);
      weeks.push({
        weekIndex: bucket.weekIndex,
        weekNumber: bucket.weekNumber,
        representativeDate: format(bucket.representativeDate, dateArgFormat),
        directory: weekDir,
        copied: copyRes.written.length,
        failed: copyRes.issues.length,
      });

      if (!options.organize || !copyRes.dirReady) continue;
      const weekPrefix = prefix
        ? `${prefix}-week-${bucket.weekNumber}`
        : undefined;
      if (dryRun) {
        organized.push(
          await this.previewOrganize(
            weekDir,
            copyRes.written,
            weekPrefix,
            logger
          )
        );
        continue;
      }
      const organizeRes = await this.organizeService.organize(weekDir, {
        prefix: weekPrefix,
      });
      if (isErr(organizeRes)) {
        logger.error({
          emoji: "❌",
          reason: organizeRes.error.message,
        })`整理 ${weekDir} 失敗`;
        issues.push({
          originPath: weekDir,
          type: "READ_FAILED",
          message: organizeRes.error.message,
        });
        continue;
      }
      organized.push(organizeRes.value);
    }

    const copied = weeks.reduce((sum, w) => sum + w.copied, 0);
    const failed = weeks.reduce((sum, w) => sum + w.failed, 0);
    logger.info({
      event: "done",
      copied,
      failed,
    })`${dryRun ? "[dry-run] 預計" : "匯入完成，"}複製 ${copied} 個檔案到 ${weeks.length} 個週資料夾，失敗 ${failed} 個`;

    return ok({
      source,
      destinationRoot,
      dryRun,
      scanned: scanned.length,
      filtered: candidates.length,
      weeks,
      copied,
      failed,
      issues,
      organized,
    });
  }

  /**
   * dry-run 時週資料夾可能已有照片，與預計複製的檔案合併後再預覽，
   * 排序與實際執行時掃描整個資料夾的結果一致。
   */
  private async previewOrganize(
    weekDir: string,
    incoming: readonly PhotoFile[],
    prefix: string | undefined,
    logger: Logger
  ): Promise<OrganizeReport> {
    const existing: PhotoFile[] = [];
    const scanIssues: FileIssue[] = [];
    if (await this.fileOperator.exists(weekDir)) {
      const scanRes = await this.scanner.scan(weekDir, {
        recursive: false,
        allowExts: photoExtensions,
      });
      if (isOk(scanRes)) {
        existing.push(...scanRes.value.files);
        scanIssues.push(...scanRes.value.issues);
      } else {
        logger.warn({
          emoji: "⚠️",
          reason: scanRes.error.message,
        })`[dry-run] 無法讀取 ${weekDir}，只預覽新複製的檔案`;
        scanIssues.push({
          originPath: weekDir,
          type: "READ_FAILED",
          message: scanRes.error.message,
        });
      }
    }

    const files = [...existing, ...incoming].sort((a, b) =>
      compareText(a.fullPath, b.fullPath)
    );
    const report = await this.organizeService.organizeFiles(weekDir, files, {
      prefix,
      dryRun: true,
    });
    return { ...report, issues: [...scanIssues, ...report.issues] };
  }

  private async copyBucket(
    bucket: WeekBucket,
    weekDir: string,
    dryRun: boolean,
    logger: Logger
  ) {
    const written: PhotoFile[] = [];
    const issues: FileIssue[] = [];

    if (dryRun) {
      logger.info({ emoji: "📁" })`[dry-run] 將建立資料夾 ${weekDir}`;
    } else {
      const mkdirRes = await this.fileOperator.ensureDir(weekDir);
      if (isErr(mkdirRes)) {
        logger.error({
          emoji: "❌",
          reason: mkdirRes.error.message,
        })`無法建立資料夾 ${weekDir}`;
        for (const file of bucket.files) {
          issues.push({
            originPath: file.fullPath,
            targetPath: weekDir,
            type: "MKDIR_FAILED",
            message: mkdirRes.error.message,
          });
        }
        return { written, issues, dirReady: false };
      }
    }

    const plannedNames = new Set<string>();
    for (const file of bucket.files) {
      const to = path.join(weekDir, file.fileName);

      if (dryRun) {
        if (plannedNames.has(file.fileName) || (await this.fileOperator.exists(to))) {
          issues.push({
            originPath: file.fullPath,
            targetPath: to,
            type: "TARGET_EXISTS",
            message: `目標已存在: ${to}`,
          });
          logger.warn({ emoji: "🧨" })`[dry-run] 目標已存在，將略過: ${to}`;
          continue;
        }
        plannedNames.add(file.fileName);
        written.push({ ...file, fullPath: to });
        logger.info({ emoji: "📝" })`[dry-run] 複製 ${file.fileName} → ${to}`;
        continue;
      }

      const copyRes = await this.fileOperator.copy(file.fullPath, to);
      if (isErr(copyRes)) {
        issues.push({
          originPath: file.fullPath,
          targetPath: to,
          type: copyRes.error.type,
          message: copyRes.error.message,
        });
        logger.warn({
          emoji: "⚠️",
          origin: file.fullPath,
          target: to,
        })`複製失敗 ${file.fileName}: ${copyRes.error.message}`;
        continue;
      }
      written.push({ ...file, fullPath: to });
      logger.debug({ event: "copied", emoji: "📦" })`${file.fullPath} → ${to}`;
    }

    return { written, issues, dirReady: true };
  }
}

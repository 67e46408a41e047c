import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { photoExtensions } from "@/constants";
import type { FileOperator } from "@/services/FileOperator";
import type { FileSystemScanner } from "@/services/FileSystemScanner";
import { categoryDirectory, classify } from "@/services/FileNameParser";
import type { FileIssue, PhotoCategory, PhotoFile } from "@/types";
import { photoCategories } from "@/types";

import type {
  CategoryStats,
  OrganizeError,
  OrganizeMove,
  OrganizeOptions,
  OrganizeReport,
  OrganizeService,
} from "./OrganizeService";
import type { SequenceService } from "./SequenceService";

export class OrganizeServiceDefault implements OrganizeService {
  private readonly scanner: FileSystemScanner;
  private readonly sequenceService: SequenceService;
  private readonly fileOperator: FileOperator;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    sequenceService: SequenceService;
    fileOperator: FileOperator;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.sequenceService = deps.sequenceService;
    this.fileOperator = deps.fileOperator;
    this.logger = deps.logger.extend("OrganizeServiceDefault");
  }

  async organize(
    directory: string,
    options: OrganizeOptions = {}
  ): Promise<Result<OrganizeReport, OrganizeError>> {
    const scanRes = await this.scanner.scan(directory, {
      recursive: false,
      allowExts: photoExtensions,
    });
    if (isErr(scanRes)) {
      return err({ type: "SCAN_FAILED", message: scanRes.error.message });
    }
    for (const issue of scanRes.value.issues) {
      this.logger.warn({
        origin: issue.originPath,
      })`無法讀取 ${issue.originPath}，略過: ${issue.message}`;
    }

    const report = await this.organizeFiles(
      directory,
      scanRes.value.files,
      options
    );
    return ok({ ...report, issues: [...scanRes.value.issues, ...report.issues] });
  }

  async organizeFiles(
    directory: string,
    files: readonly PhotoFile[],
    options: OrganizeOptions = {}
  ): Promise<OrganizeReport> {
    const { prefix } = options;
    const dryRun = options.dryRun ?? false;
    const logger = this.logger.extend("organize", { directory, dryRun });

    const groups = partition(files);
    logger.info({
      emoji: "🔎",
    })`找到 ${groups.JPEG.length} 個 JPEG、${groups.RAW.length} 個 RAW`;
    if (prefix) {
      logger.info({
        emoji: "🏷️",
      })`將以前綴 ${prefix} 重新編號命名`;
    }

    const moves: OrganizeMove[] = [];
    const issues: FileIssue[] = [];
    const byCategory: Record<PhotoCategory, CategoryStats> = {
      JPEG: { moved: 0, failed: 0 },
      RAW: { moved: 0, failed: 0 },
    };

    for (const category of photoCategories) {
      const list = groups[category];
      if (list.length === 0) continue;
      const dirName = categoryDirectory(category);
      const categoryDir = path.join(directory, dirName);
      const stats = byCategory[category];

      if (dryRun) {
        logger.info({ emoji: "📁" })`[dry-run] 將建立資料夾 ${categoryDir}`;
      } else {
        const mkdirRes = await this.fileOperator.ensureDir(categoryDir);
        if (isErr(mkdirRes)) {
          logger.error({
            emoji: "❌",
            reason: mkdirRes.error.message,
          })`無法建立資料夾 ${categoryDir}`;
          for (const file of list) {
            issues.push({
              originPath: file.fullPath,
              targetPath: categoryDir,
              type: "MKDIR_FAILED",
              message: mkdirRes.error.message,
            });
            stats.failed++;
          }
          continue;
        }
        logger.info({ emoji: "📁" })`資料夾就緒 ${categoryDir}`;
      }

      const plan = this.sequenceService.buildPlan(list, prefix);
      logger.info({
        emoji: "🚚",
        category,
      })`搬移 ${list.length} 個 ${category} 檔案到 ${dirName}/`;

      for (const entry of plan) {
        const from = entry.file.fullPath;
        const to = path.join(categoryDir, entry.targetName);
        const label = `${entry.file.fileName} → ${dirName}/${entry.targetName}`;

        if (dryRun) {
          if (await this.fileOperator.exists(to)) {
            issues.push({
              originPath: from,
              targetPath: to,
              type: "TARGET_EXISTS",
              message: `目標已存在: ${to}`,
            });
            stats.failed++;
            logger.warn({ emoji: "🧨" })`[dry-run] 目標已存在，將略過: ${label}`;
            continue;
          }
          moves.push({ from, to, category, sequence: entry.sequence });
          stats.moved++;
          logger.info({ emoji: "📝" })`[dry-run] ${label}`;
          continue;
        }

        const moveRes = await this.fileOperator.move(from, to);
        if (isErr(moveRes)) {
          issues.push({
            originPath: from,
            targetPath: to,
            type: moveRes.error.type,
            message: moveRes.error.message,
          });
          stats.failed++;
          logger.warn({
            emoji: "⚠️",
            origin: from,
            target: to,
          })`搬移失敗 ${entry.file.fileName}: ${moveRes.error.message}`;
          continue;
        }
        moves.push({ from, to, category, sequence: entry.sequence });
        stats.moved++;
        logger.debug({ event: "moved", emoji: "📦" })`${label}`;
      }
    }

    const moved = byCategory.JPEG.moved + byCategory.RAW.moved;
    const failed = byCategory.JPEG.failed + byCategory.RAW.failed;
    logger.info({
      event: "done",
      moved,
      failed,
    })`${dryRun ? "[dry-run] 預計" : "完成，"}搬移 ${moved} 個檔案，失敗 ${failed} 個`;

    return {
      directory,
      dryRun,
      ...(prefix ? { prefix } : {}),
      found: { JPEG: groups.JPEG.length, RAW: groups.RAW.length },
      moved,
      failed,
      byCategory,
      moves,
      issues,
    };
  }
}

function partition(files: readonly PhotoFile[]) {
  const groups: Record<PhotoCategory, PhotoFile[]> = { JPEG: [], RAW: [] };
  for (const file of files) {
    const category = classify(file.fileName);
    if (category === "UNKNOWN") continue;
    groups[category].push(file);
  }
  return groups;
}

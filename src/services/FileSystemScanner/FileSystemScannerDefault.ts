import { isBefore, startOfDay } from "date-fns";
import type { Dirent, Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import {
  normalizeExtension,
  parseSequenceNumber,
} from "@/services/FileNameParser";
import type { FileIssue, PhotoFile } from "@/types";
import { compareText, errorMessage } from "@/utils/helper";

import type {
  FileSystemScanner,
  ScanError,
  ScanOptions,
  ScanResult,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<ScanResult, ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    const afterDay = options?.after ? startOfDay(options.after) : undefined;

    let rootEntries: Dirent[];
    try {
      rootEntries = await this.readDirectory(rootPath);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: errorMessage(e),
      });
    }

    const issues: FileIssue[] = [];
    const candidates = await this.collect(
      rootPath,
      rootEntries,
      isRecursive,
      issues
    );

    const files: PhotoFile[] = [];
    for (const fullPath of candidates.sort(compareText)) {
      const fileName = path.basename(fullPath);
      const extension = normalizeExtension(fileName);
      if (allowExtsSet.size > 0 && !allowExtsSet.has(extension)) continue;

      let modifiedAt: Date;
      try {
        const stats = await this.readStats(fullPath);
        if (!stats.isFile()) continue;
        modifiedAt = stats.mtime;
      } catch (e) {
        issues.push({
          originPath: fullPath,
          type: "READ_FAILED",
          message: errorMessage(e),
        });
        continue;
      }

      if (afterDay && isBefore(startOfDay(modifiedAt), afterDay)) continue;

      files.push({
        fullPath,
        fileName,
        extension,
        sequenceKey: parseSequenceNumber(fileName),
        modifiedAt,
      });
    }

    return ok({ files, issues });
  }

  private async collect(
    dir: string,
    entries: Dirent[],
    recursive: boolean,
    issues: FileIssue[]
  ): Promise<string[]> {
    const found: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isFile()) {
        found.push(fullPath);
        continue;
      }
      if (!recursive || !entry.isDirectory()) continue;

      let children: Dirent[];
      try {
        children = await this.readDirectory(fullPath);
      } catch (e) {
        // 子資料夾讀不到只記錄，不中斷整體掃描
        issues.push({
          originPath: fullPath,
          type: "READ_FAILED",
          message: errorMessage(e),
        });
        continue;
      }
      found.push(...(await this.collect(fullPath, children, true, issues)));
    }
    return found;
  }

  protected readDirectory(dir: string): Promise<Dirent[]> {
    return readdir(dir, { withFileTypes: true });
  }

  protected readStats(filePath: string): Promise<Stats> {
    return stat(filePath);
  }
}

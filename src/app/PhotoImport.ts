import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { FileOperatorNode } from "@/services/FileOperator";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { OrganizeServiceDefault } from "@/services/OrganizeServiceDefault";
import { PhotoImportServiceDefault } from "@/services/PhotoImportServiceDefault";
import { SequenceServiceDefault } from "@/services/SequenceServiceDefault";
import { WeekBucketServiceDefault } from "@/services/WeekBucketServiceDefault";
import { expandHome } from "@/utils/helper";

import {
  InvocationError,
  importOptionsSchema,
  parseAfter,
  parsePrefix,
  rawOptionValue,
  validateOptions,
} from "./options";

export function registerPhotoImport(cli: CAC, baseLogger: Logger) {
  cli
    .command("import <source>", "從 SD 卡或外部資料夾匯入相片，依週次分資料夾")
    .option("--target <path>", "指定目標目錄，預設為目前工作目錄")
    .option("--weekly", "只匯入每週固定拍攝日（與起算日同星期）的相片", {
      default: false,
    })
    .option("--after <date>", "只匯入此日期（含）之後的相片，格式 YYYY-MM-DD")
    .option("--organize", "匯入後逐週整理 JPG/RAW", { default: false })
    .option("--prefix <prefix>", "整理時的命名前綴，實際為 <prefix>-week-<N>")
    .option("--dry-run", "只顯示將執行的動作，不改動檔案", { default: false })
    .action(async (source: string, rawOptions: unknown) => {
      const start = Date.now();
      const importLogger = baseLogger.extend("PhotoImport", { emoji: "📥" });
      const config = getAppConfig();

      const optionsRes = validateOptions(importOptionsSchema, rawOptions);
      if (isErr(optionsRes)) throw new InvocationError(optionsRes.error);
      const options = optionsRes.value;
      const prefixRes = parsePrefix(
        rawOptionValue(cli.rawArgs, "prefix") ?? options.prefix
      );
      if (isErr(prefixRes)) throw new InvocationError(prefixRes.error);
      const afterRes = parseAfter(
        rawOptionValue(cli.rawArgs, "after") ?? options.after
      );
      if (isErr(afterRes)) throw new InvocationError(afterRes.error);

      const sourceDir = path.resolve(expandHome(source));
      const destinationRoot = path.resolve(
        expandHome(options.target ?? process.cwd())
      );
      importLogger.info({
        event: "prepare",
      })`開始匯入相片：來源=${sourceDir} → 目標=${destinationRoot}`;

      const scanner = new FileSystemScannerDefault();
      const fileOperator = new FileOperatorNode();
      const service = new PhotoImportServiceDefault({
        scanner,
        fileOperator,
        weekBucketService: new WeekBucketServiceDefault({
          epoch: config.weekEpoch,
        }),
        organizeService: new OrganizeServiceDefault({
          scanner,
          sequenceService: new SequenceServiceDefault(),
          fileOperator,
          logger: importLogger,
        }),
        logger: importLogger,
      });

      const result = await service.import(sourceDir, {
        destinationRoot,
        weekly: options.weekly,
        after: afterRes.value,
        organize: options.organize,
        prefix: prefixRes.value,
        dryRun: options.dryRun,
      });
      if (isErr(result)) {
        throw new InvocationError(
          `來源資料夾 ${sourceDir} 無法讀取: ${result.error.message}`
        );
      }

      const report = result.value;
      if (report.weeks.length === 0) {
        importLogger.warn({ emoji: "🟡" })`沒有符合條件的相片`;
      }
      if (config.reportDir) {
        await new DumpWriterDefault(importLogger, config.reportDir).dump(
          "photo-import",
          report
        );
      }

      const elapsed = ((Date.now() - start) / 1000).toFixed(2);
      importLogger.info({ event: "done" })`匯入結束，用時 ${elapsed}s`;
    });
}

import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { FileOperatorNode } from "@/services/FileOperator";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { OrganizeServiceDefault } from "@/services/OrganizeServiceDefault";
import { SequenceServiceDefault } from "@/services/SequenceServiceDefault";
import { expandHome } from "@/utils/helper";

import {
  InvocationError,
  organizeOptionsSchema,
  parsePrefix,
  rawOptionValue,
  validateOptions,
} from "./options";

export function registerOrganize(cli: CAC, baseLogger: Logger) {
  cli
    .command("organize <dir>", "將資料夾內的 JPEG 移到 JPG/、CR3 移到 RAW/")
    .option(
      "--prefix <prefix>",
      "依相機流水號重新命名，例如 vacation → vacation-0001.jpg"
    )
    .option("--dry-run", "只顯示將執行的動作，不改動檔案", { default: false })
    .action(async (dir: string, rawOptions: unknown) => {
      const logger = baseLogger.extend("organize");
      const config = getAppConfig();

      const optionsRes = validateOptions(organizeOptionsSchema, rawOptions);
      if (isErr(optionsRes)) throw new InvocationError(optionsRes.error);
      const prefixRes = parsePrefix(
        rawOptionValue(cli.rawArgs, "prefix") ?? optionsRes.value.prefix
      );
      if (isErr(prefixRes)) throw new InvocationError(prefixRes.error);
      const dryRun = optionsRes.value.dryRun ?? false;

      const directory = path.resolve(expandHome(dir));
      logger.info({
        emoji: "📁",
      })`整理資料夾 ${directory}${dryRun ? "（dry-run）" : ""}`;

      const service = new OrganizeServiceDefault({
        scanner: new FileSystemScannerDefault(),
        sequenceService: new SequenceServiceDefault(),
        fileOperator: new FileOperatorNode(),
        logger,
      });
      const result = await service.organize(directory, {
        prefix: prefixRes.value,
        dryRun,
      });
      if (isErr(result)) {
        throw new InvocationError(
          `無法讀取資料夾 ${directory}: ${result.error.message}`
        );
      }

      const report = result.value;
      if (report.found.JPEG + report.found.RAW === 0) {
        logger.warn({ emoji: "🟡" })`${directory} 中沒有 JPEG 或 CR3 檔案`;
      }
      if (config.reportDir) {
        await new DumpWriterDefault(logger, config.reportDir).dump(
          "organize-report",
          report
        );
      }
      if (report.failed > 0) {
        logger.warn({
          emoji: "⚠️",
          failed: report.failed,
        })`有 ${report.failed} 個檔案未能搬移`;
      }
    });
}

import { cac } from "cac";

import type { Logger } from "~shared/Logger";

import { errorMessage } from "@/utils/helper";

import { registerOrganize } from "./Organize";
import { registerPhotoImport } from "./PhotoImport";
import { InvocationError } from "./options";

/**
 * 執行一次命令並回傳 exit code。
 * 個別檔案失敗不影響結果，只有呼叫錯誤（參數、來源無法讀取）回傳 1。
 */
export async function runCli(
  argv: readonly string[],
  deps: { logger: Logger; version: string }
): Promise<number> {
  const { logger } = deps;
  const cli = cac("photo-sorter");

  registerOrganize(cli, logger);
  registerPhotoImport(cli, logger);

  cli.help();
  cli.version(deps.version);

  try {
    cli.parse([...argv], { run: false });
  } catch (error) {
    logger.error({ emoji: "❌" })`${errorMessage(error)}`;
    return 1;
  }

  if (!cli.matchedCommand) {
    if (cli.options.help || cli.options.version) return 0;
    if (cli.args.length > 0) {
      logger.error({ emoji: "❌" })`未知的命令: ${cli.args[0]}`;
      cli.outputHelp();
      return 1;
    }
    cli.outputHelp();
    return 0;
  }

  try {
    await cli.runMatchedCommand();
    return 0;
  } catch (error) {
    if (isInvocationError(error)) {
      logger.error({ emoji: "❌" })`${error.message}`;
    } else {
      logger.error({ error }, "執行命令時發生錯誤");
    }
    return 1;
  }
}

// cac 的參數錯誤（未知選項、缺少參數）同樣視為呼叫錯誤
function isInvocationError(error: unknown): error is Error {
  return (
    error instanceof InvocationError ||
    (error instanceof Error && error.name === "CACError")
  );
}

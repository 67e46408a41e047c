import { constants } from "node:fs";
import { copyFile, mkdir, rename, stat, unlink, utimes } from "node:fs/promises";

import { type Result, err, isErr, ok } from "~shared/utils/Result";

import { errorCode, errorMessage, exists } from "@/utils/helper";

import type { FileOperationError, FileOperator } from "./FileOperator";

export class FileOperatorNode implements FileOperator {
  async ensureDir(dir: string): Promise<Result<void, FileOperationError>> {
    try {
      await mkdir(dir, { recursive: true });
      return ok();
    } catch (e) {
      return err({ type: "MKDIR_FAILED", message: errorMessage(e) });
    }
  }

  async move(
    from: string,
    to: string
  ): Promise<Result<void, FileOperationError>> {
    // 防覆蓋
    if (await exists(to)) {
      return err({ type: "TARGET_EXISTS", message: `目標已存在: ${to}` });
    }
    try {
      await rename(from, to);
      return ok();
    } catch (e) {
      if (errorCode(e) === "EXDEV") return this.moveAcrossDevices(from, to);
      return err({ type: "MOVE_FAILED", message: errorMessage(e) });
    }
  }

  async copy(
    from: string,
    to: string
  ): Promise<Result<void, FileOperationError>> {
    try {
      await copyFile(from, to, constants.COPYFILE_EXCL);
    } catch (e) {
      if (errorCode(e) === "EEXIST") {
        return err({ type: "TARGET_EXISTS", message: `目標已存在: ${to}` });
      }
      return err({ type: "COPY_FAILED", message: errorMessage(e) });
    }
    try {
      await this.preserveTimes(from, to);
      return ok();
    } catch (e) {
      // 失敗時目標端不留下複本
      return this.discardCopy(to, `無法保留修改時間: ${errorMessage(e)}`);
    }
  }

  exists(p: string) {
    return exists(p);
  }

  protected async preserveTimes(from: string, to: string) {
    const source = await stat(from);
    await utimes(to, source.atime, source.mtime);
  }

  private async discardCopy(
    to: string,
    message: string
  ): Promise<Result<void, FileOperationError>> {
    try {
      await unlink(to);
      return err({ type: "COPY_FAILED", message });
    } catch (e) {
      return err({
        type: "COPY_FAILED",
        message: `${message}；且無法移除複本 ${to}: ${errorMessage(e)}`,
      });
    }
  }

  private async moveAcrossDevices(
    from: string,
    to: string
  ): Promise<Result<void, FileOperationError>> {
    const copied = await this.copy(from, to);
    if (isErr(copied)) {
      return err({
        type: copied.error.type === "TARGET_EXISTS" ? "TARGET_EXISTS" : "MOVE_FAILED",
        message: copied.error.message,
      });
    }
    try {
      await unlink(from);
      return ok();
    } catch (e) {
      return err({
        type: "MOVE_FAILED",
        message: `已複製到 ${to} 但無法刪除來源: ${errorMessage(e)}`,
      });
    }
  }
}

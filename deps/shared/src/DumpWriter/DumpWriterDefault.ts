import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly outputDir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("DumpWriter");
  }

  async dump(name: string, data: unknown) {
    await mkdir(this.outputDir, { recursive: true });
    const fileName = `${format(this.now(), "yyyyMMdd-HHmmss")}-${sanitize(name)}.json`;
    const filePath = path.join(this.outputDir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "🗂️", event: "dumped" })`報告已輸出: ${filePath}`;
    return filePath;
  }
}

function sanitize(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}

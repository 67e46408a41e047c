import { once } from "node:events";
import {
  type Options as RfsOptions,
  type RotatingFileStream,
  createStream,
} from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

/**
 * 以 JSON Lines 格式寫入輪替檔案。
 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: { filename: string; rfs?: RfsOptions }) {
    this.stream = createStream(options.filename, {
      size: "10M",
      maxFiles: 10,
      ...options.rfs,
    });
  }

  write(record: LogRecord) {
    this.stream.write(`${JSON.stringify(record)}\n`);
  }

  async [Symbol.asyncDispose]() {
    const finished = once(this.stream, "finish");
    this.stream.end();
    await finished;
  }
}

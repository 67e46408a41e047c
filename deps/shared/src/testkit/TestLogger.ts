import {
  type LogLevel,
  type LogRecord,
  type LogTransport,
  LoggerConsole,
} from "~shared/Logger";

export class MemoryTransport implements LogTransport {
  readonly records: LogRecord[] = [];

  write(record: LogRecord) {
    this.records.push(record);
  }

  async [Symbol.asyncDispose]() {}
}

/**
 * 測試用 logger：不輸出到 console，所有紀錄收集在 `records`。
 */
export function buildTestLogger(level: LogLevel = "trace") {
  const transport = new MemoryTransport();
  const logger = new LoggerConsole(level, [transport], {}, {}, {
    console: false,
  });
  return { logger, records: transport.records };
}

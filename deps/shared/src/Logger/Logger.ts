import type { AsyncDisposableLike } from "~shared/utils/Disposeable";

export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

/**
 * 支援三種呼叫方式：
 * - `logger.info("訊息")`
 * - `logger.info({ event: "done" }, "訊息")`
 * - `` logger.info({ event: "done" })`共 ${count} 筆` ``
 */
export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  /** 建立子 logger，name 會接在路徑之後，context 會合併。 */
  extend(name: string, context?: LogContext): Logger;
  /** 只合併 context，不改變路徑。 */
  append(context: LogContext): Logger;
}

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string;
  event: string;
  msg: string;
  err?: { name: string; message: string; stack?: string };
  [key: string]: unknown;
};

export interface LogTransport extends AsyncDisposableLike {
  write(record: LogRecord): void;
}

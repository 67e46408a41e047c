import kleur from "kleur";

import type {
  LogContext,
  LogLevel,
  LogRecord,
  LogTransport,
  Logger,
  TemplateLog,
} from "./Logger";
import { logLevels } from "./Logger";

export type EmojiMap = Record<string, string>;

const consoleMethod: Record<LogLevel, (...args: unknown[]) => void> = {
  trace: (...args) => console.debug(...args),
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export type LoggerConsoleOptions = {
  path?: readonly string[];
  /** false 時只寫入 transports，不輸出到 console */
  console?: boolean;
};

export class LoggerConsole implements Logger {
  private readonly path: readonly string[];

  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly options: LoggerConsoleOptions = {}
  ) {
    this.path = options.path ?? [];
  }

  trace(message: string): void;
  trace(context: LogContext, message: string): void;
  trace(context?: LogContext): TemplateLog;
  trace(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("trace", a, b);
  }

  debug(message: string): void;
  debug(context: LogContext, message: string): void;
  debug(context?: LogContext): TemplateLog;
  debug(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("debug", a, b);
  }

  info(message: string): void;
  info(context: LogContext, message: string): void;
  info(context?: LogContext): TemplateLog;
  info(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("info", a, b);
  }

  warn(message: string): void;
  warn(context: LogContext, message: string): void;
  warn(context?: LogContext): TemplateLog;
  warn(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("warn", a, b);
  }

  error(message: string): void;
  error(context: LogContext, message: string): void;
  error(context?: LogContext): TemplateLog;
  error(a?: LogContext | string, b?: string): TemplateLog | void {
    return this.dispatch("error", a, b);
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      { ...this.options, path: [...this.path, name] }
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.options
    );
  }

  attachTransport(transport: LogTransport) {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose]() {
    for (const transport of this.transports.splice(0)) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private dispatch(
    level: LogLevel,
    a: LogContext | string | undefined,
    b: string | undefined
  ): TemplateLog | void {
    if (typeof a === "string") {
      this.emit(level, {}, a, a);
      return;
    }
    if (b !== undefined) {
      this.emit(level, a ?? {}, b, b);
      return;
    }
    const callContext = a ?? {};
    const template: TemplateLog = (strings, ...values) => {
      if (!this.enabled(level)) return;
      const plain = strings.reduce(
        (acc, s, i) => acc + s + (i < values.length ? String(values[i]) : ""),
        ""
      );
      const colored = strings.reduce(
        (acc, s, i) =>
          acc + s + (i < values.length ? kleur.green(String(values[i])) : ""),
        ""
      );
      const valueContext = Object.fromEntries(
        values.map((v, i) => [`__${i}`, v])
      );
      this.emit(
        level,
        { ...callContext, ...valueContext },
        plain,
        colored
      );
    };
    return template;
  }

  private enabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private emit(
    level: LogLevel,
    callContext: LogContext,
    msg: string,
    coloredMsg: string
  ) {
    if (!this.enabled(level)) return;

    const { event: callEvent, emoji: callEmoji, error, ...fields } =
      callContext;
    const {
      event: baseEvent,
      emoji: baseEmoji,
      error: _baseError,
      ...baseFields
    } = this.context;
    const event = callEvent ?? baseEvent ?? level;
    const emoji = this.pickEmoji(level, event, callEvent, callEmoji, baseEmoji);
    const merged = { ...baseFields, ...fields };
    const errorValue = toError(error);
    const pathText = this.path.join(":");

    const head = [emoji, pathText ? `${pathText}:${event}:` : `${event}:`]
      .filter(Boolean)
      .join(" ");
    if (this.options.console !== false) {
      const json =
        Object.keys(merged).length > 0 ? kleur.gray(safeStringify(merged)) : "";
      const line = [head, coloredMsg, json].filter(Boolean).join(" ");
      consoleMethod[level](
        errorValue?.stack ? `${line}\n${errorValue.stack}` : line
      );
    }

    if (this.transports.length === 0) return;
    const record: LogRecord = {
      ...merged,
      time: new Date().toISOString(),
      level,
      path: pathText,
      event,
      msg,
      ...(errorValue
        ? {
            err: {
              name: errorValue.name,
              message: errorValue.message,
              stack: errorValue.stack,
            },
          }
        : {}),
    };
    for (const transport of this.transports) transport.write(record);
  }

  private pickEmoji(
    level: LogLevel,
    event: string,
    callEvent: string | undefined,
    callEmoji: string | undefined,
    baseEmoji: string | undefined
  ) {
    if (callEmoji) return callEmoji;
    // info 沒有指定事件時，沿用 extend 帶進來的 emoji
    const eventEmoji =
      callEvent !== undefined || level !== "info"
        ? this.emojiMap[event]
        : undefined;
    return eventEmoji ?? baseEmoji ?? this.emojiMap[level] ?? "";
  }
}

function toError(error: unknown): Error | undefined {
  if (error === undefined) return undefined;
  if (error instanceof Error) return error;
  return new Error(String(error));
}

function safeStringify(value: unknown) {
  try {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "bigint" ? v.toString() : v
    );
  } catch (e) {
    return `[unserializable: ${e instanceof Error ? e.message : String(e)}]`;
  }
}

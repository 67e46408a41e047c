import { Type as t } from "@sinclair/typebox";
import path from "node:path";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { logLevels } from "./Logger";
import { type EmojiMap, LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      logLevels.map((level) => t.Literal(level)),
      { default: "info" }
    ),
    LOG_FILE: t.Optional(t.String({ minLength: 1 })),
  })
);

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
  debug: "🐛",
  trace: "🔍",
};

export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(
      new RfsTransport({
        filename: path.basename(LOG_FILE),
        rfs: { path: path.dirname(LOG_FILE) },
      })
    );
  }
  return logger;
}

import { Type as t } from "@sinclair/typebox";
import kleur from "kleur";
import { mkdir, readFile, rm } from "node:fs/promises";
import { describe, expect, test } from "vitest";

import { buildConfigFactoryEnv, envBoolean } from "~shared/ConfigFactory";
import { LoggerConsole } from "~shared/Logger";
import { RfsTransport } from "~shared/Logger/RfsTransport";
import { buildTestLogger } from "~shared/testkit/TestLogger";
import { dispose } from "~shared/utils/Disposeable";

const getLoggerConsoleTestConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOGGER_CONSOLE_TEST_OUTPUT: t.Optional(envBoolean()),
  })
);

function captureConsole<T>(fn: () => T): {
  output: string;
  errorOutput: string;
  result: T;
} {
  const output =
    getLoggerConsoleTestConfig().TEST_LOGGER_CONSOLE_TEST_OUTPUT ?? false;
  let logOut = "";
  let errorOut = "";
  const original = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
    log: console.log,
  };

  console.debug = (...args) => (logOut += args.join(" ") + "\n");
  console.info = (...args) => (logOut += args.join(" ") + "\n");
  console.warn = (...args) => (logOut += args.join(" ") + "\n");
  console.log = (...args) => (logOut += args.join(" ") + "\n");
  console.error = (...args) => (errorOut += args.join(" ") + "\n");

  let result: T;
  try {
    result = fn();
  } finally {
    Object.assign(console, original);
  }
  if (output) {
    fn();
  }

  return { output: logOut.trim(), errorOutput: errorOut.trim(), result };
}

function expectConsoleContains(
  fn: () => void,
  contains: {
    out?: string[];
    errorOut?: string[];
  }
) {
  const { output, errorOutput } = captureConsole(fn);
  if (contains.out)
    for (const str of contains.out) {
      expect(output).toContain(str);
    }
  if (contains.errorOut)
    for (const str of contains.errorOut) {
      expect(errorOutput).toContain(str);
    }
}

const emojiMap = {
  start: "🏁",
  done: "✅",
  info: "ℹ️",
  error: "❌",
  warn: "⚠️",
  debug: "🐛",
};

describe("LoggerConsole", () => {
  test("context 的 emoji 優先於 emojiMap", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const { output } = captureConsole(() =>
      logger.info({ event: "start", emoji: "🌟", userId: "abc" }, "啟動")
    );
    expect(output).toContain("🌟");
    expect(output).toContain("start: 啟動");
    expect(output).toContain('"userId":"abc"');
  });

  test("退回 emojiMap[event]", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() =>
      logger.info({ event: "start" }, "同步開始")
    );
    expect(output).toContain("🏁");
    expect(output).toContain("start: 同步開始");
  });

  test("退回 emojiMap[level]", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => logger.info({}, "預設 info emoji"));
    expect(output).toBe("ℹ️ info: 預設 info emoji");
  });

  test("extend 的 emoji 逐層退回", () => {
    const base = new LoggerConsole("info", [], {}, emojiMap).extend("base", {
      emoji: "🌟",
    });
    expectConsoleContains(() => base.info()`A`, {
      out: ["base", "🌟", "info", "A"],
    });
    const level1 = base.extend("level1", { emoji: "🚀" });
    expectConsoleContains(() => level1.info()`B`, {
      out: ["base:level1", "🚀", "info", "B"],
    });
    expectConsoleContains(() => level1.info({ event: "start" })`C`, {
      out: ["base:level1", "🏁", "start", "C"],
    });
    expectConsoleContains(() => level1.warn()`D`, {
      out: ["base:level1", "⚠️", "warn", "D"],
    });
    const level1_n = base.extend("level1_n");
    expectConsoleContains(() => level1_n.info()`E`, {
      out: ["base:level1_n", "🌟", "E"],
    });
  });

  test("template 寫法會標示數值並記錄到 context", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => {
      logger.info({ event: "done", count: 10 })`完成 ${10} 項任務`;
    });
    expect(output).toContain("✅");
    expect(output).toContain(`done: 完成 ${kleur.green("10")} 項任務`);
    expect(output).toContain('"__0":10');
  });

  test("extend 會把名稱加入路徑", () => {
    const root = new LoggerConsole("debug", [], {}, emojiMap);
    const syncLogger = root.extend("sync");
    const { output } = captureConsole(() =>
      syncLogger.info({ event: "start" }, "模組開始")
    );
    expect(output).toContain("sync:start: 模組開始");
  });

  test("append 只合併 context，不改變路徑", () => {
    const root = new LoggerConsole("debug", [], {}, emojiMap);
    const reqLogger = root.append({ traceId: "abc-123" });
    const { output } = captureConsole(() =>
      reqLogger.info({ event: "done" }, "完成")
    );
    expect(output).toContain('"traceId":"abc-123"');
    expect(output).toContain("✅ done: 完成");
  });

  test("低於設定等級的紀錄不輸出", () => {
    const logger = new LoggerConsole("warn", [], {}, emojiMap);
    const { output } = captureConsole(() => {
      logger.info("看不到");
      logger.debug()`也看不到`;
      logger.warn("看得到");
    });
    expect(output).toBe("⚠️ warn: 看得到");
  });

  test("error 會輸出堆疊", () => {
    const err = new Error("爆炸了");
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    expectConsoleContains(
      () => logger.error({ error: err, event: "error" }, "錯誤"),
      {
        errorOut: ["error", "爆炸了", "錯誤", "at "],
      }
    );
    expectConsoleContains(() => logger.error({}, "錯誤A"), {
      errorOut: ["error", "錯誤A"],
    });
    expectConsoleContains(() => logger.error()`錯誤B`, {
      errorOut: ["error", "錯誤B"],
    });
  });

  test("transport 收到結構化紀錄", () => {
    const { logger, records } = buildTestLogger("debug");
    logger
      .extend("import", { source: "/card" })
      .warn({ origin: "/card/IMG_0001.JPG" })`複製失敗 ${"IMG_0001.JPG"}`;
    logger.trace("不會記錄");

    expect(records).toHaveLength(1);
    const { time, ...rest } = records[0];
    expect(typeof time).toBe("string");
    expect(rest).toEqual({
      source: "/card",
      origin: "/card/IMG_0001.JPG",
      __0: "IMG_0001.JPG",
      level: "warn",
      path: "import",
      event: "warn",
      msg: "複製失敗 IMG_0001.JPG",
    });
  });

  test("使用 RfsTransport", async () => {
    const logDir = "test/tmp/logs";
    await rm(logDir, { recursive: true, force: true });
    await mkdir(logDir, { recursive: true });
    const logger = new LoggerConsole("debug", [], {}, emojiMap);

    const transport = new RfsTransport({
      filename: "test.log",
      rfs: {
        path: logDir,
      },
    });
    logger.attachTransport(transport);
    const { output } = captureConsole(() => {
      logger.info({ event: "start", emoji: "🌟", userId: "abc" }, "啟動");
      logger.error({ error: new Error("爆炸了"), event: "error" }, "錯誤");
    });
    expect(output).toContain("🌟");
    expect(output).toContain("start: 啟動");
    expect(output).toContain('"userId":"abc"');
    await dispose(transport);
    const text = await readFile(`${logDir}/test.log`, "utf8");
    expect(text).toContain('"level":"info"');
    expect(text).toContain('"event":"start"');
    expect(text).toContain('"msg":"啟動"');
    expect(text).toContain('"userId":"abc"');
    expect(text).toContain('"level":"error"');
    expect(text).toContain('"event":"error"');
    expect(text).toContain('"msg":"錯誤"');
    expect(text).toContain('"name":"Error"');
    expect(text).toContain('"message":"爆炸了"');
  });
});

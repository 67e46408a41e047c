import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";

import { runCli } from "@/app/cli";

import { listTree, resetDir, seedFile } from "~test/utils/fsFixture";

const tmpDir = "test/tmp/cli-organize";
const reportDir = join(tmpDir, "reports");

async function organize(...args: string[]) {
  const { logger, records } = buildTestLogger();
  const exitCode = await runCli(["node", "photo-sorter", "organize", ...args], {
    logger,
    version: "0.0.0-test",
  });
  return { exitCode, records };
}

describe("photo-sorter organize", () => {
  beforeEach(async () => {
    await resetDir(reportDir);
    vi.stubEnv("PHOTO_WEEK_EPOCH", "2024-11-06");
    vi.stubEnv("PHOTO_REPORT_DIR", reportDir);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test("數字形式的前綴照原樣使用", async () => {
    const dir = join(tmpDir, "numeric-prefix");
    await resetDir(dir);
    await seedFile(join(dir, "IMG_0003.jpg"));
    await seedFile(join(dir, "IMG_0003.CR3"));

    const { exitCode } = await organize(dir, "--prefix", "007");

    expect(exitCode).toBe(0);
    expect(await listTree(dir)).toEqual(["JPG/007-0001.jpg", "RAW/007-0001.cr3"]);
  });

  test("--prefix=值 的寫法同樣保留原字串", async () => {
    const dir = join(tmpDir, "prefix-equals");
    await resetDir(dir);
    await seedFile(join(dir, "IMG_0003.jpg"));

    const { exitCode } = await organize(dir, "--prefix=1e3");

    expect(exitCode).toBe(0);
    expect(await listTree(dir)).toEqual(["JPG/1e3-0001.jpg"]);
  });

  test("部分檔案失敗仍正常結束，並輸出報告", async () => {
    const dir = join(tmpDir, "partial");
    await resetDir(dir);
    await seedFile(join(dir, "JPG", "trip-0001.jpg"), { content: "old" });
    await seedFile(join(dir, "IMG_1.jpg"));
    await seedFile(join(dir, "IMG_2.jpg"));

    const { exitCode, records } = await organize(dir, "--prefix", "trip");

    expect(exitCode).toBe(0);
    expect(await listTree(dir)).toEqual([
      "IMG_1.jpg",
      "JPG/trip-0001.jpg",
      "JPG/trip-0002.jpg",
    ]);
    const target = resolve(dir, "JPG", "trip-0001.jpg");
    expect(records.filter((r) => r.level === "warn").map((r) => r.msg)).toEqual([
      `搬移失敗 IMG_1.jpg: 目標已存在: ${target}`,
      "有 1 個檔案未能搬移",
    ]);

    const reports = await listTree(reportDir);
    expect(reports).toHaveLength(1);
    expect(reports[0]).toMatch(/^\d{8}-\d{6}-organize-report\.json$/);
    const report: unknown = JSON.parse(
      await readFile(join(reportDir, reports[0]), "utf8")
    );
    expect(report).toMatchObject({ moved: 1, failed: 1 });
  });

  test("資料夾不存在時回傳 1", async () => {
    const dir = join(tmpDir, "missing");

    const { exitCode, records } = await organize(dir);

    expect(exitCode).toBe(1);
    const errors = records.filter((r) => r.level === "error");
    expect(errors).toHaveLength(1);
    expect(errors[0].msg).toContain(`無法讀取資料夾 ${resolve(dir)}: `);
    expect(await listTree(reportDir)).toEqual([]);
  });

  test("不合法的前綴在改動檔案前就中止", async () => {
    const dir = join(tmpDir, "bad-prefix");
    await resetDir(dir);
    await seedFile(join(dir, "IMG_1.jpg"));

    const { exitCode, records } = await organize(dir, "--prefix", "a/b");

    expect(exitCode).toBe(1);
    expect(records.filter((r) => r.level === "error").map((r) => r.msg)).toEqual([
      "前綴不可包含路徑分隔字元: a/b",
    ]);
    expect(await listTree(dir)).toEqual(["IMG_1.jpg"]);
  });

  test("未知的選項回傳 1", async () => {
    const dir = join(tmpDir, "unknown-option");
    await resetDir(dir);
    await seedFile(join(dir, "IMG_1.jpg"));

    const { exitCode } = await organize(dir, "--bogus");

    expect(exitCode).toBe(1);
    expect(await listTree(dir)).toEqual(["IMG_1.jpg"]);
  });
});

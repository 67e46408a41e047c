import { isValid, parse } from "date-fns";
import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { dateArgFormat } from "@/constants";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/** 以 UTF-16 code unit 比較，不受 locale 影響 */
export function compareText(a: string, b: string) {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e);
}

export function errorCode(e: unknown): string | undefined {
  if (typeof e !== "object" || e === null || !("code" in e)) return undefined;
  return typeof e.code === "string" ? e.code : undefined;
}

/**
 * 解析 YYYY-MM-DD（本地時間零點）。格式錯誤或不存在的日期回傳 undefined。
 */
export function parseDateArg(value: string): Date | undefined {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return undefined;
  const date = parse(value, dateArgFormat, new Date());
  return isValid(date) ? date : undefined;
}

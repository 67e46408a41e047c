import { type Static, type TSchema, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

import { type Result, err, ok } from "~shared/utils/Result";

import { parseDateArg } from "@/utils/helper";

/**
 * 參數錯誤：在任何檔案操作之前就中止。
 */
export class InvocationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvocationError";
  }
}

// cac 會把純數字轉成 number，例如 --prefix 2024
const prefixOption = t.Optional(t.Union([t.String(), t.Number()]));

export const organizeOptionsSchema = t.Object({
  prefix: prefixOption,
  dryRun: t.Optional(t.Boolean()),
});

export const importOptionsSchema = t.Object({
  target: t.Optional(t.String()),
  weekly: t.Optional(t.Boolean()),
  after: t.Optional(t.Union([t.String(), t.Number()])),
  organize: t.Optional(t.Boolean()),
  prefix: prefixOption,
  dryRun: t.Optional(t.Boolean()),
});

export function validateOptions<T extends TSchema>(
  schema: T,
  raw: unknown
): Result<Static<T>, string> {
  if (Value.Check(schema, raw)) return ok(raw);
  const details = [...Value.Errors(schema, raw)]
    .map((e) => `${e.path}: ${e.message}`)
    .join("; ");
  return err(`參數格式錯誤: ${details}`);
}

/**
 * 取回使用者輸入的原字串。cac 會把像數字的值轉成 number，
 * 例如 `--prefix 007` 變成 7、`--prefix 1e3` 變成 1000。
 */
export function rawOptionValue(
  rawArgs: readonly string[],
  name: string
): string | undefined {
  const flag = `--${name}`;
  let value: string | undefined;
  for (let i = 0; i < rawArgs.length; i++) {
    const arg = rawArgs[i];
    if (arg === "--") break;
    if (arg === flag) {
      value = rawArgs[i + 1] ?? value;
      i++;
    } else if (arg.startsWith(`${flag}=`)) {
      value = arg.slice(flag.length + 1);
    }
  }
  return value;
}

export function parsePrefix(
  value: string | number | undefined
): Result<string | undefined, string> {
  if (value === undefined) return ok(undefined);
  const prefix = String(value);
  if (prefix.length === 0) return err("前綴不可為空字串");
  if (/[/\\\0]/.test(prefix)) return err(`前綴不可包含路徑分隔字元: ${prefix}`);
  if (prefix === "." || prefix === "..") return err(`前綴不可為 ${prefix}`);
  return ok(prefix);
}

export function parseAfter(
  value: string | number | undefined
): Result<Date | undefined, string> {
  if (value === undefined) return ok(undefined);
  const date = parseDateArg(String(value));
  if (!date) return err(`日期格式錯誤: ${value}，請使用 YYYY-MM-DD`);
  return ok(date);
}

import { type StaticDecode, type TSchema, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export class ConfigError extends Error {
  constructor(readonly details: string[]) {
    super(`環境變數設定錯誤:\n${details.join("\n")}`);
    this.name = "ConfigError";
  }
}

type EnvSource = () => Record<string, string | undefined>;

/**
 * 以 typebox schema 驗證環境變數，回傳取得設定的函式。
 * 未列於 schema 的變數會被忽略，default 值會先套用再驗證。
 */
export function buildConfigFactoryEnv<T extends TSchema>(
  schema: T,
  source: EnvSource = () => process.env
) {
  return (): StaticDecode<T> => {
    const cleaned = Value.Clean(schema, { ...source() });
    const withDefaults = Value.Default(schema, cleaned);
    if (!Value.Check(schema, withDefaults)) {
      const details = [...Value.Errors(schema, withDefaults)].map(
        (e) => `${e.path || "/"}: ${e.message}`
      );
      throw new ConfigError(details);
    }
    return Value.Decode(schema, withDefaults);
  };
}

export function envBoolean() {
  return t
    .Transform(
      t.Union([
        t.Literal("true"),
        t.Literal("false"),
        t.Literal("1"),
        t.Literal("0"),
      ])
    )
    .Decode((v) => v === "true" || v === "1")
    .Encode((v): "true" | "false" => (v ? "true" : "false"));
}

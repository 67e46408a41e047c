import { Type as t } from "@sinclair/typebox";

import { ConfigError, buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { defaultWeekEpoch } from "@/constants";
import { parseDateArg } from "@/utils/helper";

const getEnvConfig = buildConfigFactoryEnv(
  t.Object({
    PHOTO_WEEK_EPOCH: t.String({ default: defaultWeekEpoch }),
    PHOTO_REPORT_DIR: t.Optional(t.String({ minLength: 1 })),
  })
);

export type AppConfig = {
  weekEpoch: Date;
  reportDir?: string;
};

export function getAppConfig(): AppConfig {
  const env = getEnvConfig();
  const weekEpoch = parseDateArg(env.PHOTO_WEEK_EPOCH);
  if (!weekEpoch) {
    throw new ConfigError([
      `PHOTO_WEEK_EPOCH: 日期格式需為 YYYY-MM-DD，收到 ${env.PHOTO_WEEK_EPOCH}`,
    ]);
  }
  return { weekEpoch, reportDir: env.PHOTO_REPORT_DIR };
}

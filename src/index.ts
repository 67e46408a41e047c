import { readFileSync } from "node:fs";

import { createDefaultLoggerFromEnv } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";

import { runCli } from "./app/cli";

const logger = createDefaultLoggerFromEnv();
const exitCode = await runCli(process.argv, {
  logger,
  version: readVersion(),
});
await dispose(logger);
process.exit(exitCode);

function readVersion() {
  const text = readFileSync(new URL("../package.json", import.meta.url), "utf8");
  const pkg: unknown = JSON.parse(text);
  if (typeof pkg === "object" && pkg !== null && "version" in pkg) {
    return String(pkg.version);
  }
  return "0.0.0";
}

import { config as dotenvConfig } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";

// Load .env from monorepo root (cwd is apps/cli/ in workspace mode)
const _here = dirname(fileURLToPath(import.meta.url)); // → apps/cli/src
dotenvConfig({ path: resolve(_here, "../../../.env") });
dotenvConfig(); // Also try a .env in the current directory

import { loadConfig } from "./env";
import type { AppConfig } from "./env";
import { ConfigError } from "./errors";
import { createLogger } from "./infra/logger";
import { runCostReport } from "./run";

function readConfig(): AppConfig | null {
  try {
    return loadConfig(process.env);
  } catch (e: unknown) {
    if (e instanceof ConfigError) {
      console.error(e.message);
      return null;
    }
    throw e;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) return 1;

  const logger = createLogger(config.logLevel);
  const controller = new AbortController();
  process.once("SIGINT", () => controller.abort());

  const result = await runCostReport(config, { logger, signal: controller.signal });
  if (result.loginAbandoned) {
    // the identity library's loopback listener would keep the process alive
    process.exit(result.exitCode);
  }
  return result.exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (e: unknown) => {
    console.error(e);
    process.exitCode = 1;
  },
);

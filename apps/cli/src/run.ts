import type { AppConfig } from "./env";
import { AuthError, FetchError, ParseError } from "./errors";
import type { Logger } from "./infra/logger";
import { silentLogger } from "./infra/logger";
import { acquireToken } from "./services/auth";
import type { CredentialFactory } from "./services/auth";
import { printCostTable, TABLE_SEPARATOR } from "./services/costTable";
import { fetchUsageDetails } from "./services/usageDetails";
import type { FetchLike } from "./services/usageDetails";

export type RunDeps = {
  writeLine?: (line: string) => void;
  logger?: Logger;
  signal?: AbortSignal;
  fetch?: FetchLike;
  createCredential?: CredentialFactory;
};

export type RunResult = {
  exitCode: 0 | 1;
  /** The browser login was cancelled or timed out and may still hold a listener. */
  loginAbandoned: boolean;
};

export async function runCostReport(config: AppConfig, deps: RunDeps = {}): Promise<RunResult> {
  const writeLine = deps.writeLine ?? console.log;
  const logger = deps.logger ?? silentLogger;

  try {
    const token = await acquireToken(config, {
      signal: deps.signal,
      createCredential: deps.createCredential,
      logger,
    });

    if (config.printAccessToken) {
      for (const line of ["", "Access Token:", "", token, "", TABLE_SEPARATOR, ""]) writeLine(line);
    }

    const doc = await fetchUsageDetails(token, config.subscriptionId, {
      fetch: deps.fetch,
      signal: deps.signal,
      logger,
    });
    const summary = printCostTable(doc, writeLine);
    logger.info("report_rendered", { subscriptionId: config.subscriptionId, ...summary });
    return { exitCode: 0, loginAbandoned: false };
  } catch (e: unknown) {
    reportFailure(e, writeLine);
    const loginAbandoned = e instanceof AuthError && e.reason !== "failed";
    return { exitCode: 1, loginAbandoned };
  }
}

function reportFailure(e: unknown, writeLine: (line: string) => void): void {
  if (e instanceof AuthError) {
    writeLine(`Authentication failed: ${e.message}`);
  } else if (e instanceof FetchError) {
    if (e.status === 0) {
      writeLine("Error: request failed");
      writeLine(`Details: ${e.statusText}`);
    } else {
      writeLine(`Error: ${`${e.status} ${e.statusText}`.trimEnd()}`);
      writeLine(`Details: ${e.body}`);
    }
  } else if (e instanceof ParseError) {
    writeLine(`Error: could not parse response: ${e.message}`);
  } else {
    throw e;
  }
}

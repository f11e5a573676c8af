import { describe, it, expect } from "vitest";
import { createLogger } from "./logger";

describe("createLogger", () => {
  it("drops events below the minimum level", () => {
    const lines: string[] = [];
    const logger = createLogger("warn", (l) => lines.push(l));

    logger.debug("usage_fetch");
    logger.info("usage_fetch");
    logger.warn("usage_details_truncated", { subscriptionId: "sub-123" });
    logger.error("usage_fetch_failed", { status: 0 });

    expect(lines.map((l) => JSON.parse(l).event)).toEqual(["usage_details_truncated", "usage_fetch_failed"]);
  });

  it("writes one JSON object per event with a timestamp", () => {
    const lines: string[] = [];
    const logger = createLogger("debug", (l) => lines.push(l));

    logger.log({ ts: "2024-01-15T00:00:00.000Z", level: "info", event: "report_rendered", rows: 3 });

    expect(lines).toEqual(['{"ts":"2024-01-15T00:00:00.000Z","level":"info","event":"report_rendered","rows":3}']);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    createLogger("silent", (l) => lines.push(l)).error("auth_failed");
    expect(lines).toEqual([]);
  });
});

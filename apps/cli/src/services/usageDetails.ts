import { z } from "zod";
import type { UsageDetailsDocument } from "@cost-tracker/types";
import { FetchError, ParseError } from "../errors";
import type { Logger } from "../infra/logger";
import { silentLogger } from "../infra/logger";

export const USAGE_DETAILS_API_VERSION = "2021-10-01";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchUsageOptions = {
  fetch?: FetchLike;
  signal?: AbortSignal;
  logger?: Logger;
};

const UsageDetailsDocumentSchema = z.object({
  value: z.unknown(),
  nextLink: z.unknown(),
});

export function usageDetailsUrl(subscriptionId: string): string {
  return `https://management.azure.com/subscriptions/${encodeURIComponent(subscriptionId)}/providers/Microsoft.Consumption/usageDetails?api-version=${USAGE_DETAILS_API_VERSION}`;
}

/**
 * Single GET against the Consumption usageDetails API. Pages behind
 * `nextLink` are not requested.
 */
export async function fetchUsageDetails(
  bearerToken: string,
  subscriptionId: string,
  opts: FetchUsageOptions = {},
): Promise<UsageDetailsDocument> {
  const doFetch = opts.fetch ?? fetch;
  const logger = opts.logger ?? silentLogger;
  const url = usageDetailsUrl(subscriptionId);
  const started = Date.now();

  let res: Response;
  try {
    res = await doFetch(url, {
      method: "GET",
      headers: { Authorization: `Bearer ${bearerToken}` },
      signal: opts.signal,
    });
  } catch (e: unknown) {
    const detail = e instanceof Error ? e.message : String(e);
    logger.error("usage_fetch_failed", { subscriptionId, detail, durationMs: Date.now() - started });
    throw new FetchError(0, detail, "", { cause: e });
  }

  let text: string;
  try {
    text = await res.text();
  } catch (e: unknown) {
    const detail = e instanceof Error ? e.message : String(e);
    logger.error("usage_fetch_failed", { subscriptionId, status: res.status, detail });
    throw new FetchError(res.status, res.statusText, "", { cause: e });
  } finally {
    if (!res.bodyUsed) await res.body?.cancel();
  }

  logger.info("usage_fetch", { subscriptionId, status: res.status, durationMs: Date.now() - started });
  if (!res.ok) {
    throw new FetchError(res.status, res.statusText, text);
  }

  const doc = parseUsageDetails(text);
  if (doc.nextLink) {
    logger.warn("usage_details_truncated", { subscriptionId, detail: "nextLink present; further pages not requested" });
  }
  return doc;
}

export function parseUsageDetails(text: string): UsageDetailsDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e: unknown) {
    throw new ParseError(`invalid JSON: ${e instanceof Error ? e.message : String(e)}`, text, { cause: e });
  }
  const parsed = UsageDetailsDocumentSchema.safeParse(json);
  if (!parsed.success) {
    throw new ParseError("expected a JSON object at the top level", text, { cause: parsed.error });
  }
  const { value, nextLink } = parsed.data;
  return typeof nextLink === "string" && nextLink ? { value, nextLink } : { value };
}

import { InteractiveBrowserCredential } from "@azure/identity";
import type { InteractiveBrowserCredentialNodeOptions, TokenCredential } from "@azure/identity";
import type { AppConfig } from "../env";
import { AuthError } from "../errors";
import type { Logger } from "../infra/logger";
import { silentLogger } from "../infra/logger";

export const AUTHORITY_HOST = "https://login.microsoftonline.com";
export const ARM_USER_IMPERSONATION_SCOPE = "https://management.azure.com/user_impersonation";

export type CredentialFactory = (options: InteractiveBrowserCredentialNodeOptions) => TokenCredential;

export type AcquireTokenOptions = {
  /** Aborting it abandons the login with reason "cancelled". */
  signal?: AbortSignal;
  scopes?: string[];
  createCredential?: CredentialFactory;
  logger?: Logger;
};

type AuthConfig = Pick<AppConfig, "clientId" | "tenantId" | "redirectUri" | "loginTimeoutMs">;

const defaultCredentialFactory: CredentialFactory = (options) => new InteractiveBrowserCredential(options);

export function authorityFor(tenantId: string): string {
  return `${AUTHORITY_HOST}/${tenantId}`;
}

/**
 * Opens the system browser for an interactive Azure AD login and resolves
 * with the raw access token. A fresh credential is built on every call, so
 * no token is ever reused between runs.
 */
export async function acquireToken(config: AuthConfig, opts: AcquireTokenOptions = {}): Promise<string> {
  const logger = opts.logger ?? silentLogger;
  const scopes = opts.scopes ?? [ARM_USER_IMPERSONATION_SCOPE];
  const createCredential = opts.createCredential ?? defaultCredentialFactory;

  if (opts.signal?.aborted) {
    throw new AuthError("cancelled", "Login cancelled before it started");
  }

  let credential: TokenCredential;
  try {
    credential = createCredential({
      clientId: config.clientId,
      tenantId: config.tenantId,
      authorityHost: AUTHORITY_HOST,
      redirectUri: config.redirectUri,
    });
  } catch (e: unknown) {
    // e.g. a malformed tenant id is rejected by the credential constructor
    const err = classifyAuthFailure(e, false, config.loginTimeoutMs, undefined);
    logger.warn("auth_failed", { reason: err.reason, detail: err.message });
    throw err;
  }

  const controller = new AbortController();
  let timedOut = false;
  const timer =
    config.loginTimeoutMs > 0
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, config.loginTimeoutMs)
      : undefined;
  const onExternalAbort = () => controller.abort();
  opts.signal?.addEventListener("abort", onExternalAbort, { once: true });

  // The browser flow does not always observe the abort signal, so the wait is
  // raced against it as well.
  const abandoned = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  const started = Date.now();
  logger.info("auth_started", { authority: authorityFor(config.tenantId), scopes });
  try {
    const token = await Promise.race([
      credential.getToken(scopes, { abortSignal: controller.signal }),
      abandoned,
    ]);
    if (!token?.token) {
      throw new AuthError("failed", "Identity provider returned no access token");
    }
    logger.info("auth_succeeded", { durationMs: Date.now() - started });
    return token.token;
  } catch (e: unknown) {
    const err = classifyAuthFailure(e, timedOut, config.loginTimeoutMs, opts.signal);
    logger.warn("auth_failed", { reason: err.reason, detail: err.message, durationMs: Date.now() - started });
    throw err;
  } finally {
    if (timer) clearTimeout(timer);
    opts.signal?.removeEventListener("abort", onExternalAbort);
  }
}

function classifyAuthFailure(
  e: unknown,
  timedOut: boolean,
  timeoutMs: number,
  external: AbortSignal | undefined,
): AuthError {
  if (e instanceof AuthError) return e;
  if (timedOut) {
    return new AuthError("timed_out", `Login not completed within ${timeoutMs} ms`, { cause: e });
  }
  if (external?.aborted) {
    return new AuthError("cancelled", "Login cancelled", { cause: e });
  }
  const message = e instanceof Error ? e.message : String(e);
  return new AuthError("failed", message || "Interactive login failed", { cause: e });
}

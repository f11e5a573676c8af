import { describe, it, expect, vi } from "vitest";
import type { AccessToken, GetTokenOptions, TokenCredential } from "@azure/identity";
import { AuthError } from "../errors";
import { ARM_USER_IMPERSONATION_SCOPE, acquireToken, authorityFor } from "./auth";
import type { CredentialFactory } from "./auth";

const config = {
  clientId: "test-client",
  tenantId: "test-tenant",
  redirectUri: "http://localhost",
  loginTimeoutMs: 0,
};

function fakeCredential(getToken: (scopes: string | string[], options?: GetTokenOptions) => Promise<AccessToken | null>) {
  const credential: TokenCredential = { getToken: vi.fn(getToken) };
  const factory = vi.fn<CredentialFactory>(() => credential);
  return { credential, factory };
}

const pending = () => new Promise<AccessToken | null>(() => {});

describe("authorityFor", () => {
  it("builds the tenant authority URL", () => {
    expect(authorityFor("test-tenant")).toBe("https://login.microsoftonline.com/test-tenant");
  });
});

describe("acquireToken", () => {
  it("returns the token from an interactive credential bound to the tenant", async () => {
    const { credential, factory } = fakeCredential(async () => ({ token: "test-token", expiresOnTimestamp: 0 }));

    const token = await acquireToken(config, { createCredential: factory });

    expect(token).toBe("test-token");
    expect(factory).toHaveBeenCalledWith({
      clientId: "test-client",
      tenantId: "test-tenant",
      authorityHost: "https://login.microsoftonline.com",
      redirectUri: "http://localhost",
    });
    expect(credential.getToken).toHaveBeenCalledWith([ARM_USER_IMPERSONATION_SCOPE], {
      abortSignal: expect.any(AbortSignal),
    });
  });

  it("builds a new credential on every call", async () => {
    const { factory } = fakeCredential(async () => ({ token: "test-token", expiresOnTimestamp: 0 }));

    await acquireToken(config, { createCredential: factory });
    await acquireToken(config, { createCredential: factory });

    expect(factory).toHaveBeenCalledTimes(2);
  });

  it("classifies a provider error as failed", async () => {
    const { factory } = fakeCredential(async () => {
      throw new Error("AADSTS65004: User declined to consent");
    });

    const err = await acquireToken(config, { createCredential: factory }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ reason: "failed", message: "AADSTS65004: User declined to consent" });
  });

  it("classifies a credential that cannot be constructed as failed", async () => {
    const factory = vi.fn<CredentialFactory>(() => {
      throw new Error("Invalid tenant id provided");
    });

    const err = await acquireToken({ ...config, tenantId: "bad tenant" }, { createCredential: factory }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(AuthError);
    expect(err).toMatchObject({ reason: "failed", message: "Invalid tenant id provided" });
  });

  it("fails when no token comes back", async () => {
    const { factory } = fakeCredential(async () => null);

    await expect(acquireToken(config, { createCredential: factory })).rejects.toMatchObject({
      reason: "failed",
      message: "Identity provider returned no access token",
    });
  });

  it("times out a login that never completes", async () => {
    const { credential, factory } = fakeCredential(pending);

    const err = await acquireToken({ ...config, loginTimeoutMs: 20 }, { createCredential: factory }).catch(
      (e: unknown) => e,
    );

    expect(err).toMatchObject({ name: "AuthError", reason: "timed_out", message: "Login not completed within 20 ms" });
    const options = vi.mocked(credential.getToken).mock.calls[0][1];
    expect(options?.abortSignal?.aborted).toBe(true);
  });

  it("stops waiting when the caller cancels", async () => {
    const { factory } = fakeCredential(pending);
    const controller = new AbortController();

    const result = acquireToken(config, { createCredential: factory, signal: controller.signal });
    controller.abort();

    await expect(result).rejects.toMatchObject({ reason: "cancelled", message: "Login cancelled" });
  });

  it("does not start a login with an already aborted signal", async () => {
    const { factory } = fakeCredential(pending);
    const controller = new AbortController();
    controller.abort();

    await expect(acquireToken(config, { createCredential: factory, signal: controller.signal })).rejects.toMatchObject({
      reason: "cancelled",
    });
    expect(factory).not.toHaveBeenCalled();
  });
});

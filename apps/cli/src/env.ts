import { z } from "zod";
import { ConfigError } from "./errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  // Azure AD public client (app registration) used for the interactive login
  AZURE_AD_CLIENT_ID: z.string().trim().min(1, "required"),
  AZURE_AD_TENANT_ID: z.string().trim().min(1, "required"),
  AZURE_AD_REDIRECT_URI: z.string().url().default("http://localhost"),
  AZURE_LOGIN_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(300_000),

  // Billing subscription queried through Microsoft.Consumption
  AZURE_SUBSCRIPTION_ID: z.string().trim().min(1, "required"),

  PRINT_ACCESS_TOKEN: booleanFlag,
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("warn"),
});

export type Env = z.infer<typeof EnvSchema>;

export type LogLevel = Env["LOG_LEVEL"];

export type AppConfig = Readonly<{
  clientId: string;
  tenantId: string;
  redirectUri: string;
  /** 0 waits for the browser login indefinitely. */
  loginTimeoutMs: number;
  subscriptionId: string;
  printAccessToken: boolean;
  logLevel: LogLevel;
}>;

export function loadEnv(processEnv: NodeJS.ProcessEnv): Env {
  const parsed = EnvSchema.safeParse(processEnv);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigError(issues);
  }
  return parsed.data;
}

export function loadConfig(processEnv: NodeJS.ProcessEnv): AppConfig {
  const env = loadEnv(processEnv);
  return Object.freeze({
    clientId: env.AZURE_AD_CLIENT_ID,
    tenantId: env.AZURE_AD_TENANT_ID,
    redirectUri: env.AZURE_AD_REDIRECT_URI,
    loginTimeoutMs: env.AZURE_LOGIN_TIMEOUT_MS,
    subscriptionId: env.AZURE_SUBSCRIPTION_ID,
    printAccessToken: env.PRINT_ACCESS_TOKEN,
    logLevel: env.LOG_LEVEL,
  });
}

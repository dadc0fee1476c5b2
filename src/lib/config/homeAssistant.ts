import { isIPv6 } from "node:net";

import { z } from "zod";

import { HomeAssistantConfigError, InvalidUrlError } from "@/lib/home-assistant/errors";
import { checkUrl } from "@/lib/home-assistant/url";

export const DEFAULT_TIMEOUT_MS = 10000; // 10 seconds

export const homeAssistantConfigSchema = z.object({
  ssl: z.boolean().default(false),
  // Certificate verification only applies when ssl is on.
  verify: z.boolean().default(true),
  ipAddress: z.string().min(1),
  token: z.string().min(1),
  portNumber: z.number().int().min(1).max(65535).optional(),
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS)
});

export type HomeAssistantConfigInput = z.input<typeof homeAssistantConfigSchema>;
export type HomeAssistantConfig = Readonly<z.output<typeof homeAssistantConfigSchema>>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => {
      const path = issue.path.join(".");
      return `${path}: ${issue.message}`;
    })
    .join(", ");
}

export function parseHomeAssistantConfig(input: HomeAssistantConfigInput): HomeAssistantConfig {
  const result = homeAssistantConfigSchema.safeParse(input);
  if (!result.success) {
    throw new HomeAssistantConfigError(`Home Assistant configuration is invalid: ${formatIssues(result.error)}`);
  }
  return Object.freeze(result.data);
}

export function buildBaseUrl(config: HomeAssistantConfig): string {
  const scheme = config.ssl ? "https" : "http";
  const host = isIPv6(config.ipAddress) ? `[${config.ipAddress}]` : config.ipAddress;
  const base = `${scheme}://${host}`;
  return config.portNumber ? `${base}:${config.portNumber}` : base;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1");

const envSchema = z.object({
  HOME_ASSISTANT_HOST: z.string().min(1),
  HOME_ASSISTANT_TOKEN: z.string().min(1),
  HOME_ASSISTANT_PORT: z.coerce.number().int().min(1).max(65535).optional(),
  HOME_ASSISTANT_SSL: booleanFlag.default("false"),
  HOME_ASSISTANT_VERIFY: booleanFlag.default("true"),
  HOME_ASSISTANT_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS)
});

export type HomeAssistantEnv = z.infer<typeof envSchema>;

/**
 * Read client configuration from environment variables. The host may be a
 * full URL; only its host part is kept.
 */
export function createHomeAssistantEnv(source: Record<string, unknown> = process.env): HomeAssistantConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    throw new HomeAssistantConfigError(`Environment validation failed: ${formatIssues(result.error)}`);
  }

  const env = result.data;
  let ipAddress: string;
  try {
    ipAddress = checkUrl(env.HOME_ASSISTANT_HOST);
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      throw new HomeAssistantConfigError(`Environment validation failed: HOME_ASSISTANT_HOST: ${error.message}`);
    }
    throw error;
  }

  return parseHomeAssistantConfig({
    ipAddress,
    token: env.HOME_ASSISTANT_TOKEN,
    ssl: env.HOME_ASSISTANT_SSL,
    verify: env.HOME_ASSISTANT_VERIFY,
    timeoutMs: env.HOME_ASSISTANT_TIMEOUT_MS,
    ...(env.HOME_ASSISTANT_PORT !== undefined ? { portNumber: env.HOME_ASSISTANT_PORT } : {})
  });
}

/**
 * Verify Home Assistant configuration is valid
 */
export function verifyHomeAssistantConfigured(
  source: Record<string, unknown> = process.env
): { ok: true } | { ok: false; reason: string } {
  try {
    createHomeAssistantEnv(source);
    return { ok: true };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { ok: false, reason: `Failed to verify Home Assistant configuration: ${errorMessage}` };
  }
}

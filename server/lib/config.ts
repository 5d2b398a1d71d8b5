import { DEFAULT_DRIVE_API_BASE_URL } from "@server/lib/drive-client";
import { z } from "zod";

const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
const DEFAULT_PORT = 8787;

// A blank variable counts as unset, so its default applies
const blankAsUnset = (val: unknown) =>
  typeof val === "string" && val.trim() === "" ? undefined : val;

// Zod schema for the process environment
export const envSchema = z.object({
  GOOGLE_API_KEY: z.string().trim().min(1),
  GOOGLE_DRIVE_FOLDER_ID: z.string().trim().min(1),
  DRIVE_API_BASE_URL: z.string().url().default(DEFAULT_DRIVE_API_BASE_URL),
  DRIVE_REQUEST_TIMEOUT_MS: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().nonnegative().default(DEFAULT_REQUEST_TIMEOUT_MS),
  ),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.preprocess(
    blankAsUnset,
    z.coerce.number().int().min(0).max(65535).default(DEFAULT_PORT),
  ),
  LOG_REQUESTS: z
    .enum(["true", "false"])
    .default("true")
    .transform((val) => val === "true"),
});

export type GatewayConfig = {
  apiKey: string;
  folderId: string;
  driveApiBaseUrl: string;
  /** Cap for each outbound Drive call; 0 means no cap. */
  requestTimeoutMs: number;
  host: string;
  port: number;
  logRequests: boolean;
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Build the gateway configuration from environment variables.
 * Throws ConfigError when a mandatory value is missing or a value is malformed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Readonly<GatewayConfig> {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const parsed = result.data;
  return Object.freeze({
    apiKey: parsed.GOOGLE_API_KEY,
    folderId: parsed.GOOGLE_DRIVE_FOLDER_ID,
    driveApiBaseUrl: parsed.DRIVE_API_BASE_URL,
    requestTimeoutMs: parsed.DRIVE_REQUEST_TIMEOUT_MS,
    host: parsed.HOST,
    port: parsed.PORT,
    logRequests: parsed.LOG_REQUESTS,
  });
}

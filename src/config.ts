import dotenv from "dotenv";
import fs from "fs-extra";
import { z } from "zod";
import { ValidationError } from "./errors";
import { DEFAULT_DOWNLOAD_PREFIX } from "./session/naming";

export type StorageBackend = "s3" | "local";

/**
 * Everything a session needs from the outside world
 */
export interface SessionConfig {
  /** S3-compatible endpoint; AWS when omitted */
  endpoint?: string;
  region: string;
  /** Falls back to the SDK's default credential chain when omitted */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  bucketName: string;
  forcePathStyle: boolean;
  maxAttempts: number;
  downloadDir: string;
  downloadPrefix: string;
  verifyDownloads: boolean;
  backend: StorageBackend;
  /** Root directory of the local backend */
  localRoot: string;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const EnvSchema = z
  .object({
    S3_ENDPOINT: z.string().url().optional(),
    S3_REGION: z.string().min(1).default("us-east-1"),
    S3_ACCESS_KEY: z.string().min(1).optional(),
    S3_SECRET_KEY: z.string().min(1).optional(),
    S3_BUCKET: z.string().min(1).default("mybucket"),
    S3_FORCE_PATH_STYLE: booleanFlag.default("true"),
    S3_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    DOWNLOAD_DIR: z.string().min(1).default("."),
    DOWNLOAD_PREFIX: z.string().default(DEFAULT_DOWNLOAD_PREFIX),
    VERIFY_DOWNLOADS: booleanFlag.default("true"),
    STORAGE_BACKEND: z.enum(["s3", "local"]).default("s3"),
    STORAGE_ROOT: z.string().min(1).default("data"),
  })
  .refine(
    (env) => (env.S3_ACCESS_KEY === undefined) === (env.S3_SECRET_KEY === undefined),
    {
      message: "S3_ACCESS_KEY and S3_SECRET_KEY must be set together",
      path: ["S3_ACCESS_KEY"],
    },
  );

export const CONFIG_ENV_KEYS = [
  "S3_ENDPOINT",
  "S3_REGION",
  "S3_ACCESS_KEY",
  "S3_SECRET_KEY",
  "S3_BUCKET",
  "S3_FORCE_PATH_STYLE",
  "S3_MAX_ATTEMPTS",
  "DOWNLOAD_DIR",
  "DOWNLOAD_PREFIX",
  "VERIFY_DOWNLOADS",
  "STORAGE_BACKEND",
  "STORAGE_ROOT",
] as const;

// An explicit empty value is meaningful for these
const EMPTY_ALLOWED: ReadonlySet<string> = new Set(["DOWNLOAD_PREFIX"]);

/**
 * Builds a SessionConfig from environment variables. Empty values count as
 * unset, except DOWNLOAD_PREFIX where an empty value means no prefix.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv): SessionConfig {
  const input: Record<string, string> = {};
  for (const key of CONFIG_ENV_KEYS) {
    const value = env[key]?.trim();
    if (value || (value !== undefined && EMPTY_ALLOWED.has(key))) {
      input[key] = value;
    }
  }

  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid configuration: ${problems}`);
  }

  const values = parsed.data;
  return {
    endpoint: values.S3_ENDPOINT,
    region: values.S3_REGION,
    credentials:
      values.S3_ACCESS_KEY && values.S3_SECRET_KEY
        ? {
            accessKeyId: values.S3_ACCESS_KEY,
            secretAccessKey: values.S3_SECRET_KEY,
          }
        : undefined,
    bucketName: values.S3_BUCKET,
    forcePathStyle: values.S3_FORCE_PATH_STYLE,
    maxAttempts: values.S3_MAX_ATTEMPTS,
    downloadDir: values.DOWNLOAD_DIR,
    downloadPrefix: values.DOWNLOAD_PREFIX,
    verifyDownloads: values.VERIFY_DOWNLOADS,
    backend: values.STORAGE_BACKEND,
    localRoot: values.STORAGE_ROOT,
  };
}

/**
 * Reads a .env file into `target` without overriding variables already set
 * there. A missing file is only an error when it was asked for explicitly.
 */
export function loadEnvFile(
  envPath: string,
  target: NodeJS.ProcessEnv,
  required = false,
): void {
  if (!fs.existsSync(envPath)) {
    if (required) {
      throw new ValidationError(`Environment file not found: ${envPath}`);
    }
    return;
  }

  const parsed = dotenv.parse(fs.readFileSync(envPath));
  for (const [key, value] of Object.entries(parsed)) {
    if (target[key] === undefined) {
      target[key] = value;
    }
  }
}

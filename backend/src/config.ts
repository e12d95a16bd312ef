import "dotenv/config";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  PORT: numberFromEnv(8080),
  STORAGE_DIR: z.string().min(1).default("downloads"),
  MAX_FILE_SIZE_MB: numberFromEnv(10),
  SESSION_WARNING_SEC: numberFromEnv(300),
  IDLE_TIMEOUT_SEC: numberFromEnv(420),
  SESSION_EXPIRE_SEC: numberFromEnv(600),
  SWEEP_INTERVAL_SEC: numberFromEnv(30),
  USAGE_LIMIT: numberFromEnv(10),
  USAGE_WARNING_THRESHOLD: numberFromEnv(7),
  USAGE_WINDOW_SEC: numberFromEnv(7 * 24 * 60 * 60),
  MAX_CONTENT_CHARS: numberFromEnv(15_000),
  AI_REQUEST_TIMEOUT_SEC: numberFromEnv(120),
  FIX_PROVIDER: z.enum(["anthropic", "gemini"]).default("anthropic"),
  FIX_MODEL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  GEMINI_API_KEY: z.string().optional()
});

export const SUPPORTED_EXTENSIONS = [".docx"];

export type AppConfig = {
  port: number;
  storageDir: string;
  maxFileSizeBytes: number;
  sessionWarningMs: number;
  idleTimeoutMs: number;
  sessionExpireMs: number;
  sweepIntervalMs: number;
  usageLimit: number;
  usageWarningThreshold: number;
  usageWindowMs: number;
  maxContentChars: number;
  aiRequestTimeoutMs: number;
  fixProvider: "anthropic" | "gemini";
  fixModel?: string;
  fixApiKey?: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join(".")).join(", ");
    throw new ConfigurationError(`Invalid environment configuration: ${fields}`);
  }

  const values = parsed.data;
  if (values.IDLE_TIMEOUT_SEC >= values.SESSION_EXPIRE_SEC) {
    throw new ConfigurationError("IDLE_TIMEOUT_SEC must be shorter than SESSION_EXPIRE_SEC.");
  }
  if (values.SESSION_WARNING_SEC >= values.IDLE_TIMEOUT_SEC) {
    throw new ConfigurationError("SESSION_WARNING_SEC must be shorter than IDLE_TIMEOUT_SEC.");
  }
  if (values.USAGE_WARNING_THRESHOLD >= values.USAGE_LIMIT) {
    throw new ConfigurationError("USAGE_WARNING_THRESHOLD must be below USAGE_LIMIT.");
  }

  const apiKey =
    values.FIX_PROVIDER === "anthropic" ? values.ANTHROPIC_API_KEY : values.GEMINI_API_KEY;

  return {
    port: values.PORT,
    storageDir: path.resolve(process.cwd(), values.STORAGE_DIR),
    maxFileSizeBytes: values.MAX_FILE_SIZE_MB * 1024 * 1024,
    sessionWarningMs: values.SESSION_WARNING_SEC * 1000,
    idleTimeoutMs: values.IDLE_TIMEOUT_SEC * 1000,
    sessionExpireMs: values.SESSION_EXPIRE_SEC * 1000,
    sweepIntervalMs: values.SWEEP_INTERVAL_SEC * 1000,
    usageLimit: values.USAGE_LIMIT,
    usageWarningThreshold: values.USAGE_WARNING_THRESHOLD,
    usageWindowMs: values.USAGE_WINDOW_SEC * 1000,
    maxContentChars: values.MAX_CONTENT_CHARS,
    aiRequestTimeoutMs: values.AI_REQUEST_TIMEOUT_SEC * 1000,
    fixProvider: values.FIX_PROVIDER,
    fixModel: values.FIX_MODEL?.trim() || undefined,
    fixApiKey: apiKey?.trim() || undefined
  };
}

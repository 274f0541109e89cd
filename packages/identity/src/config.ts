import { z } from "zod";

const LOG_LEVELS = ["silent", "error", "warn", "info"] as const;

const toNumber = (fallback: number) => (value: unknown) => {
  if (value === undefined || value === null || value === "") {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const clampNumber = (fallback: number, min: number, max: number) => (value: unknown) => {
  const parsed = toNumber(fallback)(value);
  return Math.max(min, Math.min(max, Math.trunc(parsed)));
};

const toLogLevel = (value: unknown) => {
  const normalized = typeof value === "string" ? value.trim().toLowerCase() : "";
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
};

const envSchema = z.object({
  IDENTITY_MANAGEMENT_THRESHOLD: z.preprocess(clampNumber(1, 1, 64), z.number().int().min(1)),
  IDENTITY_ACTION_THRESHOLD: z.preprocess(clampNumber(1, 1, 64), z.number().int().min(1)),
  IDENTITY_MAX_PENDING_EXECUTIONS: z.preprocess(
    clampNumber(1024, 1, 100_000),
    z.number().int().min(1)
  ),
  IDENTITY_BATCH_SIGNATURE_BYTES: z.preprocess(
    clampNumber(32, 1, 1024),
    z.number().int().min(1)
  ),
  IDENTITY_MAX_BATCH_CLAIMS: z.preprocess(clampNumber(256, 1, 4096), z.number().int().min(1)),
  LOG_LEVEL: z.preprocess(toLogLevel, z.enum(LOG_LEVELS))
});

export type IdentityEnv = z.infer<typeof envSchema>;

export type IdentityConfig = {
  managementThreshold: number;
  actionThreshold: number;
  maxPendingExecutions: number;
  batchSignatureBytes: number;
  maxBatchClaims: number;
  logLevel: IdentityEnv["LOG_LEVEL"];
};

export const loadConfig = (env: Record<string, string | undefined> = process.env): IdentityConfig => {
  const parsed = envSchema.parse(env);
  return {
    managementThreshold: parsed.IDENTITY_MANAGEMENT_THRESHOLD,
    actionThreshold: parsed.IDENTITY_ACTION_THRESHOLD,
    maxPendingExecutions: parsed.IDENTITY_MAX_PENDING_EXECUTIONS,
    batchSignatureBytes: parsed.IDENTITY_BATCH_SIGNATURE_BYTES,
    maxBatchClaims: parsed.IDENTITY_MAX_BATCH_CLAIMS,
    logLevel: parsed.LOG_LEVEL
  };
};

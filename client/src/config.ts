/**
 * Operation client configuration.
 *
 * Values come from the constructor, falling back to the environment
 * (see loadConfigFromEnv) and then to defaultOperationClientConfig.
 */

import { z } from "zod";
import { OperationError } from "./errors.js";

export interface OperationClientConfig {
  // ── NATS ──────────────────────────────────────────────────────────
  natsUrl?: string;
  natsName?: string;

  // ── Operations ────────────────────────────────────────────────────
  /** Operations are sent to `${subjectPrefix}.${operation}` */
  subjectPrefix?: string;
  defaultTimeoutMs?: number;

  // ── Retry ─────────────────────────────────────────────────────────
  /** Total attempts including the first. 1 disables retries. */
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
}

export type ResolvedOperationClientConfig = Required<OperationClientConfig>;

export const defaultOperationClientConfig = {
  natsUrl: "nats://127.0.0.1:4222",
  natsName: "opstack-client",
  subjectPrefix: "ops",
  defaultTimeoutMs: 30_000,
  maxAttempts: 3,
  retryBaseDelayMs: 100,
  retryMaxDelayMs: 5_000,
} as const;

/** Per-request timeout: a positive whole number of milliseconds. */
export const TimeoutMsSchema = z.number().int().positive();

const AttemptsSchema = z.number().int().min(1);
const DelayMsSchema = z.number().int().nonnegative();

const ResolvedConfigSchema = z.object({
  natsUrl: z.string().url(),
  natsName: z.string().min(1),
  subjectPrefix: z.string().min(1),
  defaultTimeoutMs: TimeoutMsSchema,
  maxAttempts: AttemptsSchema,
  retryBaseDelayMs: DelayMsSchema,
  retryMaxDelayMs: DelayMsSchema,
});

const EnvSchema = z.object({
  OPSTACK_NATS_URL: z.string().url().optional(),
  OPSTACK_NATS_NAME: z.string().min(1).optional(),
  OPSTACK_SUBJECT_PREFIX: z.string().min(1).optional(),
  OPSTACK_TIMEOUT_MS: z.coerce.number().pipe(TimeoutMsSchema).optional(),
  OPSTACK_MAX_ATTEMPTS: z.coerce.number().pipe(AttemptsSchema).optional(),
  OPSTACK_RETRY_BASE_MS: z.coerce.number().pipe(DelayMsSchema).optional(),
  OPSTACK_RETRY_MAX_MS: z.coerce.number().pipe(DelayMsSchema).optional(),
});

/**
 * Load config from environment variables. Unset variables are left out so
 * they can be layered under explicit options.
 * Env: OPSTACK_NATS_URL, OPSTACK_NATS_NAME, OPSTACK_SUBJECT_PREFIX,
 * OPSTACK_TIMEOUT_MS, OPSTACK_MAX_ATTEMPTS, OPSTACK_RETRY_BASE_MS, OPSTACK_RETRY_MAX_MS.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
): OperationClientConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new OperationError({
      code: "VALIDATION_ERROR",
      message: "opstack-client:config - Invalid environment configuration",
      details: parsed.error.format(),
    });
  }

  const e = parsed.data;
  const config: OperationClientConfig = {
    natsUrl: e.OPSTACK_NATS_URL,
    natsName: e.OPSTACK_NATS_NAME,
    subjectPrefix: e.OPSTACK_SUBJECT_PREFIX,
    defaultTimeoutMs: e.OPSTACK_TIMEOUT_MS,
    maxAttempts: e.OPSTACK_MAX_ATTEMPTS,
    retryBaseDelayMs: e.OPSTACK_RETRY_BASE_MS,
    retryMaxDelayMs: e.OPSTACK_RETRY_MAX_MS,
  };
  return dropUndefined(config);
}

/**
 * Layers configs left to right over the defaults; undefined never overrides.
 * Throws VALIDATION_ERROR if the result is out of range.
 */
export function resolveConfig(...layers: OperationClientConfig[]): ResolvedOperationClientConfig {
  let resolved: ResolvedOperationClientConfig = { ...defaultOperationClientConfig };
  for (const layer of layers) {
    resolved = { ...resolved, ...dropUndefined(layer) };
  }

  const parsed = ResolvedConfigSchema.safeParse(resolved);
  if (!parsed.success) {
    throw new OperationError({
      code: "VALIDATION_ERROR",
      message: "opstack-client:config - Invalid configuration",
      details: parsed.error.format(),
    });
  }
  return parsed.data;
}

function dropUndefined(config: OperationClientConfig): OperationClientConfig {
  const out: OperationClientConfig = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) Object.assign(out, { [key]: value });
  }
  return out;
}

/**
 * @tollgate/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * `.env` is loaded by the entry point before this runs.
 */

import { z } from "zod";
import type { CyclePolicyOverrides } from "@tollgate/reconciler";

// =============================================================================
// Schema
// =============================================================================

const QueryParamsSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

export type CallParams = z.infer<typeof QueryParamsSchema>;

const CallParamsSchema = z
  .string()
  .transform((raw, ctx) => {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "CALL_PARAMS must be valid JSON" });
      return z.NEVER;
    }
  })
  .pipe(z.array(QueryParamsSchema).min(1));

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true");

const optionalUrl = z.string().url().optional();

export const ConfigSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),

    // Target
    SANDBOX: flag,
    SANDBOX_PORT: z.coerce.number().int().min(1).max(65535).default(4010),
    LEDGER_URL: optionalUrl,
    IDENTITY_URL: optionalUrl,
    CONSUMER_API_KEY: z.string().optional(),
    CONSUMER_ADDRESS: z.string().min(1).optional(),
    SUBSCRIPTION_ID: z.string().min(1).optional(),

    // Cycle policy
    MIN_BALANCE: z.coerce.number().int().min(0).default(2),
    MAX_TOP_UPS: z.coerce.number().int().min(0).default(5),
    SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(10000),
    SETTLE_MAX_POLLS: z.coerce.number().int().min(0).default(3),
    CYCLE_DEADLINE_MS: z.coerce.number().int().min(1).default(120000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
    MISMATCH_POLICY: z.enum(["throw", "report"]).default("throw"),
    CALL_PARAMS: CallParamsSchema.default('[{"name":"Foo"},{}]'),

    // Endpoint process
    SERVE_COMMAND: z.string().min(1).optional(),
    SERVE_READY_URL: optionalUrl,
    /** Registered as the service endpoint; defaults to SERVE_READY_URL */
    SERVE_ENDPOINT_URL: optionalUrl,

    // Provisioning (SERVE_COMMAND without SUBSCRIPTION_ID)
    CREATOR_API_KEY: z.string().min(1).optional(),
    PROVISION_PRICE: z.coerce.number().int().min(0).default(10000),
    PROVISION_TOKEN_ADDRESS: z.string().min(1).default("0x75faf114eafb1BDbe2F0316DF893fd58CE46AA4d"),
    PROVISION_CREDITS_PER_ORDER: z.coerce.number().int().min(1).default(100),
  })
  .superRefine((config, ctx) => {
    if (config.SERVE_COMMAND !== undefined && config.SERVE_READY_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SERVE_READY_URL"],
        message: "SERVE_READY_URL is required with SERVE_COMMAND",
      });
    }
    if (config.SANDBOX) {
      return;
    }
    for (const key of ["LEDGER_URL", "CONSUMER_ADDRESS"] as const) {
      if (config[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required unless SANDBOX=true`,
        });
      }
    }
    if (config.SUBSCRIPTION_ID !== undefined) {
      return;
    }
    if (config.SERVE_COMMAND === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["SUBSCRIPTION_ID"],
        message: "SUBSCRIPTION_ID is required unless SANDBOX=true or SERVE_COMMAND is set",
      });
    } else if (config.CREATOR_API_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CREATOR_API_KEY"],
        message: "CREATOR_API_KEY is required to provision a service for SERVE_COMMAND",
      });
    }
  });

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return ConfigSchema.parse(env);
}

/**
 * Cycle policy overrides carried by the configuration.
 */
export function cyclePolicyFromConfig(config: CliConfig): CyclePolicyOverrides {
  return {
    minimumBalance: config.MIN_BALANCE,
    maxTopUps: config.MAX_TOP_UPS,
    settle: { minDelayMs: config.SETTLE_DELAY_MS, maxPolls: config.SETTLE_MAX_POLLS },
    deadlineMs: config.CYCLE_DEADLINE_MS,
    onMismatch: config.MISMATCH_POLICY,
  };
}

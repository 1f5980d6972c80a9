import "dotenv/config";
import { z } from "zod";
import { DEFAULT_POLICY, definePolicy, type PolicyConfig } from "./policy.js";

const csv = z
  .string()
  .default("")
  .transform((s) =>
    s
      .split(",")
      .map((x) => x.trim())
      .filter(Boolean)
  );

/** Validate & normalize environment variables */
export const EnvSchema = z.object({
  DB_PATH: z.string().default("./data/signals.db"),
  FEED_URLS: csv,
  POLL_FEEDS_SECONDS: z.coerce.number().default(300),
  ADMIN_POLL_SECONDS: z.coerce.number().default(10),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

  DISCORD_BOT_TOKEN: z.string().optional(),
  DISCORD_PREMIUM_CHANNEL_ID: z.string().optional(),
  DISCORD_FREE_CHANNEL_ID: z.string().optional(),
  DISCORD_ADMIN_CHANNEL_ID: z.string().optional(),
  ADMIN_USER_IDS: csv,

  PER_KEYWORD_WEIGHT: z.coerce.number().default(DEFAULT_POLICY.perKeywordWeight),
  MIN_CONFIDENCE: z.coerce.number().default(DEFAULT_POLICY.minConfidence),
  RECENCY_HOURS: z.coerce.number().default(DEFAULT_POLICY.recencyHours),
  AUTO_APPROVE_THRESHOLD: z.coerce
    .number()
    .default(DEFAULT_POLICY.autoApproveThreshold),
  FREE_TIER_THRESHOLD: z.coerce.number().default(DEFAULT_POLICY.freeTierThreshold),
  PREMIUM_TIER_THRESHOLD: z.coerce
    .number()
    .default(DEFAULT_POLICY.premiumTierThreshold),
  FREE_DELAY_HOURS: z.coerce.number().default(DEFAULT_POLICY.freeDelayHours),
  WEEKLY_FREE_CAP: z.coerce.number().default(DEFAULT_POLICY.weeklyFreeCap),
  RELEASE_WINDOW_DAYS: z.coerce.number().default(DEFAULT_POLICY.releaseWindowDays),
  PREMIUM_MAX_ATTEMPTS: z.coerce
    .number()
    .default(DEFAULT_POLICY.premiumMaxAttempts),
  PREMIUM_RETRY_WINDOW_HOURS: z.coerce
    .number()
    .default(DEFAULT_POLICY.premiumRetryWindowHours),
  TRANSPORT_TIMEOUT_MS: z.coerce
    .number()
    .default(DEFAULT_POLICY.transportTimeoutMs),
  DELIVERY_LEASE_SECONDS: z.coerce
    .number()
    .default(DEFAULT_POLICY.deliveryLeaseSeconds),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return EnvSchema.parse(source);
}

export function policyFromEnv(env: Env): PolicyConfig {
  return definePolicy({
    perKeywordWeight: env.PER_KEYWORD_WEIGHT,
    minConfidence: env.MIN_CONFIDENCE,
    recencyHours: env.RECENCY_HOURS,
    autoApproveThreshold: env.AUTO_APPROVE_THRESHOLD,
    freeTierThreshold: env.FREE_TIER_THRESHOLD,
    premiumTierThreshold: env.PREMIUM_TIER_THRESHOLD,
    freeDelayHours: env.FREE_DELAY_HOURS,
    weeklyFreeCap: env.WEEKLY_FREE_CAP,
    releaseWindowDays: env.RELEASE_WINDOW_DAYS,
    premiumMaxAttempts: env.PREMIUM_MAX_ATTEMPTS,
    premiumRetryWindowHours: env.PREMIUM_RETRY_WINDOW_HOURS,
    transportTimeoutMs: env.TRANSPORT_TIMEOUT_MS,
    deliveryLeaseSeconds: env.DELIVERY_LEASE_SECONDS,
  });
}

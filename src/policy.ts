import { z } from "zod";

const unit = z.number().min(0).max(1);

/** Immutable policy knobs handed to the core at construction time. */
export const PolicySchema = z
  .object({
    perKeywordWeight: z.number().positive(),
    minConfidence: unit,
    recencyHours: z.number().positive(),
    autoApproveThreshold: unit,
    freeTierThreshold: unit,
    premiumTierThreshold: unit,
    freeDelayHours: z.number().min(0),
    weeklyFreeCap: z.number().int().min(0),
    releaseWindowDays: z.number().positive(),
    premiumMaxAttempts: z.number().int().min(1),
    premiumRetryWindowHours: z.number().min(0),
    transportTimeoutMs: z.number().int().positive(),
    deliveryLeaseSeconds: z.number().int().positive(),
  })
  .refine((p) => p.premiumTierThreshold <= p.freeTierThreshold, {
    message: "premiumTierThreshold must not exceed freeTierThreshold",
  })
  // a lease must outlive the send it guards
  .refine((p) => p.deliveryLeaseSeconds * 1000 > p.transportTimeoutMs, {
    message: "deliveryLeaseSeconds must exceed transportTimeoutMs",
  });

export type PolicyConfig = Readonly<z.infer<typeof PolicySchema>>;

export const DEFAULT_POLICY: PolicyConfig = Object.freeze({
  perKeywordWeight: 0.06,
  minConfidence: 0.5,
  recencyHours: 4,
  autoApproveThreshold: 0.95,
  freeTierThreshold: 0.85,
  premiumTierThreshold: 0.7,
  freeDelayHours: 24,
  weeklyFreeCap: 3,
  releaseWindowDays: 7,
  premiumMaxAttempts: 3,
  premiumRetryWindowHours: 6,
  transportTimeoutMs: 8000,
  deliveryLeaseSeconds: 60,
});

export function definePolicy(overrides: Partial<PolicyConfig> = {}): PolicyConfig {
  return Object.freeze(PolicySchema.parse({ ...DEFAULT_POLICY, ...overrides }));
}

export const HOUR_MS = 3_600_000;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Shared types across the signal pipeline
 */
export type RawArticle = {
  title: string;
  description: string;
  link: string;
  publishedAt: string; // ISO, or "" when the feed omitted it
  source: string; // feed title or host
};

export const SIGNAL_TYPES = [
  "funding",
  "product_launch",
  "innovation",
  "acquisition",
  "ipo",
  "general",
] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

export const APPROVAL_STATUSES = [
  "pending",
  "approved",
  "auto_approved",
  "rejected",
] as const;
export type ApprovalStatus = (typeof APPROVAL_STATUSES)[number];

export const TIER_ASSIGNMENTS = ["premium", "free", "both", "none"] as const;
export type TierAssignment = (typeof TIER_ASSIGNMENTS)[number];

/** Tiers an operator may pick when overriding the computed assignment. */
export type OverrideTier = Exclude<TierAssignment, "none">;

/** A single audience destination. */
export type Audience = "premium" | "free";

/** Classifier output, before the state machine assigns id/status/tier. */
export interface SignalDraft {
  signalType: SignalType;
  source: string;
  title: string;
  link: string;
  content: string;
  confidence: number; // 0..1
  detectedAt: string; // ISO
  prediction: string;
  evidence: readonly string[];
  matchedKeywords: readonly string[];
  articleId: string | null;
}

export interface Signal extends SignalDraft {
  id: string;
  approvalStatus: ApprovalStatus;
  tierAssignment: TierAssignment;
  sentFree: boolean;
  sentPremium: boolean;
  approvedAt: string | null;
  rejectReason: string | null;
  sentFreeAt: string | null;
  sentPremiumAt: string | null;
  premiumAttempts: number;
}

/** Dedup ledger entry */
export type Article = {
  id: string;
  title: string;
  source: string;
  link: string;
  publishedDate: string;
  processed: boolean;
};

export const isApproved = (s: Pick<Signal, "approvalStatus">) =>
  s.approvalStatus === "approved" || s.approvalStatus === "auto_approved";

export const includesFree = (t: TierAssignment) => t === "free" || t === "both";
export const includesPremium = (t: TierAssignment) =>
  t === "premium" || t === "both";

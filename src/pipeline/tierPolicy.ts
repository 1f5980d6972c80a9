import { HOUR_MS, type PolicyConfig } from "../policy.js";
import {
  includesFree,
  isApproved,
  type Signal,
  type TierAssignment,
} from "../types.js";
import { loadVocabulary, termRx, type Vocabulary } from "./vocabulary.js";

export type ReleaseDecision =
  | { send: true; reason: "ready" }
  | {
      send: false;
      reason: "weekly limit" | "premium-only" | "not approved" | "no free tier";
    }
  | { send: false; reason: "delay remaining"; remainingHours: number };

const round2 = (x: number) => Math.round(x * 100) / 100;

/** Tier assignment at creation and the free-tier release gate. */
export class TierPolicy {
  private readonly premiumOnly: RegExp[];

  constructor(
    private readonly policy: PolicyConfig,
    vocabulary: Vocabulary = loadVocabulary()
  ) {
    this.premiumOnly = vocabulary.premiumOnly.map(termRx);
  }

  isPremiumOnly(content: string) {
    const x = content.toLowerCase();
    return this.premiumOnly.some((rx) => rx.test(x));
  }

  decide(s: Pick<Signal, "content" | "confidence">): TierAssignment {
    if (this.isPremiumOnly(s.content)) return "premium";
    if (s.confidence >= this.policy.freeTierThreshold) return "both";
    if (s.confidence >= this.policy.premiumTierThreshold) return "premium";
    return "none";
  }

  /**
   * Free-tier gate. `weeklyFreeSends` is the number of free sends in the
   * trailing 7 days and must be read fresh for every call.
   */
  shouldReleaseToFree(
    s: Pick<Signal, "tierAssignment" | "approvalStatus" | "detectedAt">,
    now: Date,
    weeklyFreeSends: number
  ): ReleaseDecision {
    if (weeklyFreeSends >= this.policy.weeklyFreeCap)
      return { send: false, reason: "weekly limit" };
    if (s.tierAssignment === "premium")
      return { send: false, reason: "premium-only" };
    if (!isApproved(s)) return { send: false, reason: "not approved" };
    if (!includesFree(s.tierAssignment))
      return { send: false, reason: "no free tier" };

    const elapsed = now.getTime() - Date.parse(s.detectedAt);
    const delay = this.policy.freeDelayHours * HOUR_MS;
    if (elapsed < delay) {
      return {
        send: false,
        reason: "delay remaining",
        remainingHours: round2((delay - elapsed) / HOUR_MS),
      };
    }
    return { send: true, reason: "ready" };
  }
}

import { describe, it, expect } from "vitest";
import { HOUR, T0 } from "../../__tests__/helpers.js";
import { DEFAULT_POLICY, definePolicy } from "../../policy.js";
import type { ApprovalStatus, TierAssignment } from "../../types.js";
import { TierPolicy } from "../tierPolicy.js";

const now = new Date(T0);
const hoursAgo = (h: number) => new Date(now.getTime() - h * HOUR).toISOString();

const candidate = (
  tierAssignment: TierAssignment,
  approvalStatus: ApprovalStatus = "approved",
  detectedAt = hoursAgo(25)
) => ({ tierAssignment, approvalStatus, detectedAt });

describe("TierPolicy.decide", () => {
  const tiers = new TierPolicy(DEFAULT_POLICY);

  it("keeps premium-only topics premium regardless of confidence", () => {
    expect(tiers.decide({ content: "Acme acquires Beta", confidence: 0.99 })).toBe(
      "premium"
    );
    expect(
      tiers.decide({ content: "Closes a Series A round", confidence: 0.5 })
    ).toBe("premium");
  });

  it("maps confidence bands to tiers", () => {
    const content = "Startup unveils prototype";
    expect(tiers.decide({ content, confidence: 0.92 })).toBe("both");
    expect(tiers.decide({ content, confidence: 0.85 })).toBe("both");
    expect(tiers.decide({ content, confidence: 0.72 })).toBe("premium");
    expect(tiers.decide({ content, confidence: 0.7 })).toBe("premium");
    expect(tiers.decide({ content, confidence: 0.69 })).toBe("none");
    expect(tiers.decide({ content, confidence: 0.6 })).toBe("none");
  });

  it("matches premium-only terms as whole words", () => {
    expect(tiers.isPremiumOnly("Fundraiser for the local school")).toBe(false);
    expect(tiers.isPremiumOnly("IPO filing expected")).toBe(true);
  });
});

describe("TierPolicy.shouldReleaseToFree", () => {
  const tiers = new TierPolicy(DEFAULT_POLICY);

  it("checks the weekly limit before anything else", () => {
    expect(tiers.shouldReleaseToFree(candidate("premium"), now, 3)).toEqual({
      send: false,
      reason: "weekly limit",
    });
  });

  it("never releases premium-only signals", () => {
    expect(tiers.shouldReleaseToFree(candidate("premium"), now, 0)).toEqual({
      send: false,
      reason: "premium-only",
    });
  });

  it("requires an approved status", () => {
    expect(
      tiers.shouldReleaseToFree(candidate("both", "pending"), now, 0)
    ).toEqual({ send: false, reason: "not approved" });
    expect(
      tiers.shouldReleaseToFree(candidate("both", "rejected"), now, 0)
    ).toEqual({ send: false, reason: "not approved" });
  });

  it("requires a tier that includes free", () => {
    expect(tiers.shouldReleaseToFree(candidate("none"), now, 0)).toEqual({
      send: false,
      reason: "no free tier",
    });
  });

  it("reports the remaining delay in hours", () => {
    expect(
      tiers.shouldReleaseToFree(candidate("both", "approved", hoursAgo(10)), now, 0)
    ).toEqual({ send: false, reason: "delay remaining", remainingHours: 14 });
    expect(
      tiers.shouldReleaseToFree(candidate("free", "approved", hoursAgo(23.5)), now, 0)
    ).toEqual({ send: false, reason: "delay remaining", remainingHours: 0.5 });
  });

  it("releases once the delay has fully elapsed", () => {
    expect(
      tiers.shouldReleaseToFree(candidate("both", "approved", hoursAgo(24)), now, 2)
    ).toEqual({ send: true, reason: "ready" });
    expect(
      tiers.shouldReleaseToFree(candidate("free", "auto_approved"), now, 0)
    ).toEqual({ send: true, reason: "ready" });
  });

  it("follows the configured cap and delay", () => {
    const strict = new TierPolicy(definePolicy({ weeklyFreeCap: 0, freeDelayHours: 0 }));
    expect(strict.shouldReleaseToFree(candidate("both"), now, 0)).toEqual({
      send: false,
      reason: "weekly limit",
    });

    const instant = new TierPolicy(definePolicy({ freeDelayHours: 0 }));
    expect(
      instant.shouldReleaseToFree(candidate("both", "approved", T0), now, 0)
    ).toEqual({ send: true, reason: "ready" });
  });
});

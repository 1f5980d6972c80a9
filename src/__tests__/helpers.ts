// =============================================================================
// Shared fakes for the test suites
// =============================================================================
// In-memory SQLite, a recording transport, a scripted feed source and a
// manually advanced clock. Nothing here touches the network.
// =============================================================================

import { SignalDB } from "../db/SignalDB.js";
import type { OpResult } from "../errors.js";
import type { ContentProvider } from "../jobs/content.js";
import type { RenderedMessage, Transport } from "../notify/transport.js";
import { ApprovalStateMachine } from "../pipeline/approval.js";
import { DispatchCoordinator, type Destinations } from "../pipeline/dispatch.js";
import { TierPolicy } from "../pipeline/tierPolicy.js";
import { definePolicy, type PolicyConfig } from "../policy.js";
import type { FeedSource } from "../providers/index.js";
import type { RawArticle, Signal, SignalDraft } from "../types.js";

/** Sunday 2026-10-18 12:00 UTC */
export const T0 = "2026-10-18T12:00:00.000Z";
export const MINUTE = 60_000;
export const HOUR = 60 * MINUTE;
export const DAY = 24 * HOUR;

export const PREMIUM = "premium-channel";
export const FREE = "free-channel";

export class TestClock {
  private t: number;

  constructor(start: string = T0) {
    this.t = Date.parse(start);
  }

  now = () => new Date(this.t);

  advance(ms: number) {
    this.t += ms;
  }

  set(iso: string) {
    this.t = Date.parse(iso);
  }
}

export class RecordingTransport implements Transport {
  readonly sent: { destination: string; message: RenderedMessage }[] = [];
  readonly failing = new Set<string>();

  async send(destination: string, message: RenderedMessage) {
    if (this.failing.has(destination)) return false;
    this.sent.push({ destination, message });
    return true;
  }

  to(destination: string) {
    return this.sent.filter((s) => s.destination === destination);
  }
}

export class FakeFeedSource implements FeedSource {
  constructor(public feeds: Record<string, RawArticle[] | Error> = {}) {}

  async poll(url: string) {
    const feed = this.feeds[url];
    if (feed === undefined) throw new Error(`unknown feed ${url}`);
    if (feed instanceof Error) throw feed;
    return feed;
  }
}

export const fixedContent: ContentProvider = {
  trend: (p) => `trend:${p}`,
  insight: (p) => `insight:${p}`,
  question: (p) => `question:${p}`,
};

export function makeArticle(overrides: Partial<RawArticle> = {}): RawArticle {
  return {
    title: "Nimbus raises $12 million from investors",
    description: "The startup plans expansion.",
    link: "https://example.com/nimbus",
    publishedAt: new Date(Date.parse(T0) - HOUR).toISOString(),
    source: "TechWire",
    ...overrides,
  };
}

export function makeDraft(overrides: Partial<SignalDraft> = {}): SignalDraft {
  return {
    signalType: "innovation",
    source: "TechWire",
    title: "Startup unveils prototype",
    link: "https://example.com/prototype",
    content: "Startup unveils prototype",
    confidence: 0.9,
    detectedAt: T0,
    prediction: "Watch for early customer announcements.",
    evidence: ["Reported by TechWire"],
    matchedKeywords: ["startup"],
    articleId: null,
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<Signal> = {}): Signal {
  return {
    ...makeDraft(),
    id: "sig-1",
    approvalStatus: "pending",
    tierAssignment: "both",
    sentFree: false,
    sentPremium: false,
    approvedAt: null,
    rejectReason: null,
    sentFreeAt: null,
    sentPremiumAt: null,
    premiumAttempts: 0,
    ...overrides,
  };
}

export interface HarnessOptions {
  policy?: Partial<PolicyConfig>;
  destinations?: Destinations;
  start?: string;
}

export function makeHarness(opts: HarnessOptions = {}) {
  const clock = new TestClock(opts.start);
  const policy = definePolicy(opts.policy);
  const store = new SignalDB(":memory:");
  const transport = new RecordingTransport();
  const tierPolicy = new TierPolicy(policy);
  const dispatcher = new DispatchCoordinator({
    store,
    transport,
    tierPolicy,
    policy,
    destinations: opts.destinations ?? { premium: PREMIUM, free: FREE },
    clock: clock.now,
  });
  const machine = new ApprovalStateMachine({
    store,
    tierPolicy,
    dispatcher,
    policy,
    clock: clock.now,
  });
  return { clock, policy, store, transport, tierPolicy, dispatcher, machine };
}

export function expectOk<T>(res: OpResult<T>): T {
  if (!res.ok) throw new Error(`expected ok, got ${res.error.code}`);
  return res.value;
}

export function expectError<T>(res: OpResult<T>) {
  if (res.ok) throw new Error("expected an error result");
  return res.error;
}

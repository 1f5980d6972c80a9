import { describe, it, expect, vi } from "vitest";
import { CalendarRunner, weeklyQa } from "../jobs/calendar.js";
import { Classifier } from "../pipeline/classify.js";
import { Deduplicator } from "../pipeline/dedupe.js";
import type { FeedSource } from "../providers/index.js";
import { SchedulerLoop } from "../scheduler.js";
import type { RawArticle } from "../types.js";
import {
  FREE,
  FakeFeedSource,
  HOUR,
  PREMIUM,
  T0,
  fixedContent,
  makeArticle,
  makeHarness,
} from "./helpers.js";

const BAD = "https://bad.example/feed";
const GOOD = "https://good.example/feed";

const funding = makeArticle();
const stale = makeArticle({
  title: "Orbit raises $3 million seed round",
  publishedAt: new Date(Date.parse(T0) - 5 * HOUR).toISOString(),
});
const chatter = makeArticle({
  title: "Local bakery opens second shop",
  description: "",
});
const breakthrough = makeArticle({
  title: "Unicorn startup reports breakthrough",
  description:
    "The venture backed founders see growth in global enterprise customers and revenue at scale.",
});

function makeLoop(feeds: FeedSource, feedUrls: string[]) {
  const h = makeHarness();
  const calendar = new CalendarRunner({
    store: h.store,
    transport: h.transport,
    destinations: { premium: PREMIUM, free: FREE },
    content: fixedContent,
    policy: h.policy,
    clock: h.clock.now,
  });
  const loop = new SchedulerLoop({
    feeds,
    feedUrls,
    classifier: new Classifier(h.policy),
    dedupe: new Deduplicator(h.store),
    machine: h.machine,
    dispatcher: h.dispatcher,
    calendar,
    policy: h.policy,
    intervalMs: 60_000,
    clock: h.clock.now,
  });
  return { ...h, calendar, loop };
}

describe("SchedulerLoop.tick", () => {
  it("ingests fresh articles and isolates a failing feed", async () => {
    const feeds = new FakeFeedSource({
      [BAD]: new Error("503 Service Unavailable"),
      [GOOD]: [funding, stale, chatter],
    });
    const { loop, store } = makeLoop(feeds, [BAD, GOOD]);

    const report = await loop.tick();

    expect(report?.aborted).toBeUndefined();
    expect(report?.ingest).toEqual({
      fetched: 3,
      failedFeeds: 1,
      stale: 1,
      dropped: 1,
      duplicates: 0,
      created: 1,
      autoApproved: 0,
      errors: 0,
    });
    expect(report?.jobs).toEqual([]);

    const pending = store.listPending(10);
    expect(pending).toHaveLength(1);
    expect(pending[0]).toMatchObject({
      title: funding.title,
      confidence: 0.65,
      tierAssignment: "premium",
      articleId: new Deduplicator(store).articleId(funding),
    });
  });

  it("never creates a second signal for the same article", async () => {
    const feeds = new FakeFeedSource({ [GOOD]: [funding] });
    const { loop, store, clock } = makeLoop(feeds, [GOOD]);

    await loop.tick();
    clock.advance(5 * 60_000);
    const second = await loop.tick();

    expect(second?.ingest).toMatchObject({ duplicates: 1, created: 0 });
    expect(store.statusCounts().pending).toBe(1);
  });

  it("auto-approves and delivers high-confidence articles in the same tick", async () => {
    const feeds = new FakeFeedSource({ [GOOD]: [breakthrough] });
    const { loop, transport } = makeLoop(feeds, [GOOD]);

    const report = await loop.tick();

    expect(report?.ingest).toMatchObject({ created: 1, autoApproved: 1 });
    expect(transport.to(PREMIUM)).toHaveLength(1);
    expect(transport.to(FREE)).toHaveLength(0);
  });

  it("releases the free alert on a later tick", async () => {
    const feeds = new FakeFeedSource({ [GOOD]: [breakthrough] });
    const { loop, transport, clock } = makeLoop(feeds, [GOOD]);

    await loop.tick();
    clock.advance(36 * HOUR);
    const later = await loop.tick();

    expect(later?.release).toMatchObject({ scanned: 1, sent: 1 });
    expect(transport.to(FREE)).toHaveLength(1);
  });

  it("skips a tick while the previous one is still running", async () => {
    let finish: (articles: RawArticle[]) => void = () => undefined;
    const slow: FeedSource = {
      poll: () =>
        new Promise<RawArticle[]>((resolve) => {
          finish = resolve;
        }),
    };
    const { loop } = makeLoop(slow, [GOOD]);

    const first = loop.tick();
    expect(await loop.tick()).toBeNull();

    finish([]);
    expect((await first)?.ingest?.fetched).toBe(0);
  });

  it("aborts the tick when the store is unavailable", async () => {
    const feeds = new FakeFeedSource({ [GOOD]: [funding] });
    const { loop, store } = makeLoop(feeds, [GOOD]);
    store.close();

    const report = await loop.tick();

    expect(report?.aborted).toMatch(/^Store unavailable during insertArticle/);
    expect(report?.release).toBeUndefined();

    // the loop itself stays usable
    expect(await loop.tick()).not.toBeNull();
  });

  it("re-attempts an owed calendar post", async () => {
    const feeds = new FakeFeedSource({ [GOOD]: [] });
    const { loop, calendar, transport } = makeLoop(feeds, [GOOD]);
    transport.failing.add(FREE);
    expect((await calendar.fire(weeklyQa)).map((r) => r.outcome)).toEqual(["failed"]);

    transport.failing.clear();
    const report = await loop.tick();

    expect(report?.jobs).toEqual([
      { job: "weekly_qa", period: "2026-W42", audience: "free", outcome: "sent" },
    ]);
    expect(transport.to(FREE)).toHaveLength(1);
  });
});

describe("SchedulerLoop.stop", () => {
  it("stops the calendar tasks with the loop", () => {
    const { loop, calendar } = makeLoop(new FakeFeedSource(), []);
    const stop = vi.spyOn(calendar, "stop");

    loop.stop();

    expect(stop).toHaveBeenCalledTimes(1);
  });
});

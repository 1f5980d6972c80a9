import { StoreUnavailableError, errorMessage } from "./errors.js";
import type { CalendarRunner, JobRunReport } from "./jobs/calendar.js";
import { log } from "./logger.js";
import type { ApprovalStateMachine } from "./pipeline/approval.js";
import { isFresh, type Classifier } from "./pipeline/classify.js";
import type { Deduplicator } from "./pipeline/dedupe.js";
import type { DispatchCoordinator, ScanReport } from "./pipeline/dispatch.js";
import type { PolicyConfig } from "./policy.js";
import { pollAllFeeds, type FeedSource } from "./providers/index.js";

export interface IngestReport {
  fetched: number;
  failedFeeds: number;
  stale: number;
  dropped: number; // below the publishing threshold
  duplicates: number;
  created: number;
  autoApproved: number;
  errors: number;
}

export interface TickReport {
  startedAt: string;
  tookMs: number;
  ingest?: IngestReport;
  release?: ScanReport;
  premiumRetry?: ScanReport;
  jobs?: JobRunReport[];
  /** Set when the store failed and the rest of the tick was skipped. */
  aborted?: string;
}

export interface SchedulerDeps {
  feeds: FeedSource;
  feedUrls: readonly string[];
  classifier: Classifier;
  dedupe: Deduplicator;
  machine: ApprovalStateMachine;
  dispatcher: DispatchCoordinator;
  calendar: CalendarRunner;
  policy: PolicyConfig;
  intervalMs: number;
  clock?: () => Date;
}

/**
 * Single cooperative worker: ingest → delayed release → owed calendar posts.
 * Calendar jobs themselves fire from node-cron, started and stopped with the loop.
 */
export class SchedulerLoop {
  private readonly clock: () => Date;
  private timer: NodeJS.Timeout | undefined;
  private running = false;

  constructor(private readonly deps: SchedulerDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  private async ingest(): Promise<IngestReport> {
    const { feeds, feedUrls, classifier, dedupe, machine, policy } = this.deps;
    const { articles, failedFeeds } = await pollAllFeeds(feeds, feedUrls);
    const report: IngestReport = {
      fetched: articles.length,
      failedFeeds: failedFeeds.length,
      stale: 0,
      dropped: 0,
      duplicates: 0,
      created: 0,
      autoApproved: 0,
      errors: 0,
    };

    for (const article of articles) {
      try {
        const now = this.clock();
        if (!isFresh(article, now, policy.recencyHours)) {
          report.stale++;
          continue;
        }
        const draft = classifier.classify(article, now);
        if (!draft) {
          report.dropped++;
          continue;
        }
        const articleId = dedupe.admit(article);
        if (!articleId) {
          report.duplicates++;
          continue;
        }
        const res = await machine.create({ ...draft, articleId });
        report.created++;
        if (res.autoApproved) report.autoApproved++;
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        report.errors++;
        log.error("[TICK] article failed", {
          title: article.title.slice(0, 120),
          err: errorMessage(err),
        });
      }
    }
    return report;
  }

  /** One full pass; returns null when the previous tick is still running. */
  async tick(): Promise<TickReport | null> {
    if (this.running) {
      log.warn("[TICK] previous tick still running, skipping");
      return null;
    }
    this.running = true;
    const started = Date.now();
    const report: TickReport = {
      startedAt: this.clock().toISOString(),
      tookMs: 0,
    };

    try {
      report.ingest = await this.ingest();
      report.release = await this.deps.dispatcher.scanDelayedReleases();
      report.premiumRetry = await this.deps.dispatcher.retryPremium();
      report.jobs = await this.deps.calendar.retryOwed();
    } catch (err) {
      report.aborted = errorMessage(err);
      if (err instanceof StoreUnavailableError)
        log.error("[TICK] store unavailable, retrying next interval", {
          err: report.aborted,
        });
      else log.error("[TICK] aborted", { err: report.aborted });
    } finally {
      this.running = false;
      report.tookMs = Date.now() - started;
    }

    log.info("[TICK] done", report);
    return report;
  }

  start() {
    if (this.timer) return;
    log.info("[TICK] scheduler started", {
      intervalMs: this.deps.intervalMs,
      feeds: this.deps.feedUrls.length,
    });
    this.deps.calendar.start();
    void this.tick();
    this.timer = setInterval(() => void this.tick(), this.deps.intervalMs);
  }

  stop() {
    if (this.timer) clearInterval(this.timer);
    this.timer = undefined;
    this.deps.calendar.stop();
  }
}

import cron, { type ScheduledTask } from "node-cron";
import type { SignalStore } from "../db/store.js";
import { StoreUnavailableError, errorMessage } from "../errors.js";
import { log } from "../logger.js";
import {
  renderCountsDigest,
  renderDigest,
  renderText,
} from "../notify/templates.js";
import {
  sendWithTimeout,
  type RenderedMessage,
  type Transport,
} from "../notify/transport.js";
import { DAY_MS, type PolicyConfig } from "../policy.js";
import type { Audience, SignalType } from "../types.js";
import type { Destinations } from "../pipeline/dispatch.js";
import type { ContentProvider } from "./content.js";

/* ---------------- period keys (UTC) ---------------- */
export function isoWeekKey(d: Date) {
  const t = new Date(
    Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate())
  );
  const dow = t.getUTCDay() || 7;
  t.setUTCDate(t.getUTCDate() + 4 - dow); // Thursday decides the ISO year
  const yearStart = Date.UTC(t.getUTCFullYear(), 0, 1);
  const week = Math.ceil(((t.getTime() - yearStart) / DAY_MS + 1) / 7);
  return `${t.getUTCFullYear()}-W${String(week).padStart(2, "0")}`;
}

export function monthKey(d: Date) {
  return `${d.getUTCFullYear()}-${String(d.getUTCMonth() + 1).padStart(2, "0")}`;
}

/** Monday 00:00 UTC of the ISO week containing `d`. */
export function weekStartUtc(d: Date) {
  const dow = d.getUTCDay() || 7;
  return new Date(
    Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate() - (dow - 1))
  );
}

/* ---------------- jobs ---------------- */
export interface JobContext {
  store: SignalStore;
  content: ContentProvider;
  now: Date;
  period: string;
}

export interface CalendarJob {
  name: string;
  audiences: readonly Audience[];
  /** node-cron expression, evaluated in UTC */
  schedule: string;
  /** Run-once key: at most one post per audience per period. */
  period(now: Date): string;
  render(ctx: JobContext): RenderedMessage;
}

export const weeklyDigest: CalendarJob = {
  name: "weekly_digest",
  audiences: ["premium", "free"],
  schedule: "0 9 * * 1",
  period: isoWeekKey,
  render: ({ store, content, now, period }) =>
    renderDigest(
      `Weekly digest — ${period}`,
      store.listApprovedBetween(
        new Date(now.getTime() - 7 * DAY_MS).toISOString(),
        now.toISOString()
      ),
      content.trend(period)
    ),
};

export const midweekDigest: CalendarJob = {
  name: "midweek_digest",
  audiences: ["premium"],
  schedule: "0 12 * * 3",
  period: isoWeekKey,
  render: ({ store, content, now, period }) =>
    renderDigest(
      `Midweek check-in — ${period}`,
      store.listApprovedBetween(
        weekStartUtc(now).toISOString(),
        now.toISOString()
      ),
      content.insight(period),
      5
    ),
};

export const weeklyQa: CalendarJob = {
  name: "weekly_qa",
  audiences: ["free"],
  schedule: "0 15 * * 5",
  period: isoWeekKey,
  render: ({ content, period }) =>
    renderText(`**Weekly Q&A** — ${content.question(period)}`),
};

export const monthlyDigest: CalendarJob = {
  name: "monthly_digest",
  audiences: ["premium", "free"],
  schedule: "0 10 1 * *",
  period: monthKey,
  render: ({ store, content, now, period }) => {
    const thisMonth = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1);
    const lastMonth = Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1);
    const counts: Partial<Record<SignalType, number>> = {};
    for (const s of store.listApprovedBetween(
      new Date(lastMonth).toISOString(),
      new Date(thisMonth).toISOString()
    )) {
      counts[s.signalType] = (counts[s.signalType] ?? 0) + 1;
    }
    return renderCountsDigest(
      `Monthly recap — ${monthKey(new Date(lastMonth))}`,
      counts,
      content.trend(period)
    );
  },
};

export const DEFAULT_JOBS: readonly CalendarJob[] = [
  weeklyDigest,
  midweekDigest,
  weeklyQa,
  monthlyDigest,
];

export interface JobRunReport {
  job: string;
  period: string;
  audience: Audience;
  outcome: "sent" | "failed" | "unconfigured" | "error";
}

export interface CalendarDeps {
  store: SignalStore;
  transport: Transport;
  destinations: Destinations;
  content: ContentProvider;
  policy: PolicyConfig;
  jobs?: readonly CalendarJob[];
  clock?: () => Date;
}

/**
 * Registers the jobs with node-cron and posts each one once per
 * (period, audience). Audiences whose send failed stay owed until the period
 * ends and are re-attempted by `retryOwed`.
 */
export class CalendarRunner {
  private readonly jobs: readonly CalendarJob[];
  private readonly clock: () => Date;
  private readonly tasks: ScheduledTask[] = [];
  private readonly owed = new Map<string, { job: CalendarJob; period: string }>();
  private chain: Promise<unknown> = Promise.resolve();

  constructor(private readonly deps: CalendarDeps) {
    this.jobs = deps.jobs ?? DEFAULT_JOBS;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Cron fire and tick retry never post for the same job at once. */
  private serialize<T>(run: () => Promise<T>): Promise<T> {
    const next = this.chain.then(run, run);
    this.chain = next.catch(() => undefined);
    return next;
  }

  /** Runs `job` for the period that contains now. */
  fire(job: CalendarJob): Promise<JobRunReport[]> {
    return this.serialize(() => {
      const now = this.clock();
      const period = job.period(now);
      this.owed.set(job.name, { job, period });
      return this.runJob(job, period, now);
    });
  }

  /** Re-attempts audiences of fired jobs that have not gone out in their period. */
  retryOwed(): Promise<JobRunReport[]> {
    return this.serialize(async () => {
      const now = this.clock();
      const out: JobRunReport[] = [];
      for (const [name, { job, period }] of this.owed) {
        if (job.period(now) !== period) {
          log.warn("[JOBS] period ended before every audience was sent", {
            job: name,
            period,
          });
          this.owed.delete(name);
          continue;
        }
        out.push(...(await this.runJob(job, period, now)));
      }
      return out;
    });
  }

  start() {
    if (this.tasks.length) return;
    for (const job of this.jobs) {
      this.tasks.push(
        cron.schedule(job.schedule, () => void this.fireLogged(job), {
          timezone: "UTC",
        })
      );
    }
    log.info("[JOBS] scheduled", {
      jobs: Object.fromEntries(this.jobs.map((j) => [j.name, j.schedule])),
    });
  }

  stop() {
    for (const task of this.tasks) task.stop();
    this.tasks.length = 0;
  }

  private async fireLogged(job: CalendarJob) {
    const started = Date.now();
    log.info("[JOBS] starting", { job: job.name });
    try {
      const runs = await this.fire(job);
      log.info("[JOBS] completed", {
        job: job.name,
        tookMs: Date.now() - started,
        runs,
      });
    } catch (err) {
      log.error("[JOBS] failed", {
        job: job.name,
        tookMs: Date.now() - started,
        err: errorMessage(err),
      });
    }
  }

  private async runJob(
    job: CalendarJob,
    period: string,
    now: Date
  ): Promise<JobRunReport[]> {
    const { store, transport, destinations, content, policy } = this.deps;
    const out: JobRunReport[] = [];
    let outstanding = false;

    for (const audience of job.audiences) {
      const destination = destinations[audience];
      if (!destination) {
        log.warn("[JOBS] no destination", { job: job.name, audience });
        out.push({ job: job.name, period, audience, outcome: "unconfigured" });
        continue;
      }
      if (store.hasJobRun(job.name, period, audience)) continue;

      try {
        const message = job.render({ store, content, now, period });
        const res = await sendWithTimeout(
          transport,
          destination,
          message,
          policy.transportTimeoutMs
        );
        if (res.ok) {
          store.recordJobRun(job.name, period, audience, now.toISOString());
          log.info("[JOBS] sent", { job: job.name, period, audience });
        } else {
          outstanding = true;
          log.warn("[JOBS] not sent", {
            job: job.name,
            period,
            audience,
            reason: res.reason,
          });
        }
        out.push({
          job: job.name,
          period,
          audience,
          outcome: res.ok ? "sent" : "failed",
        });
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        outstanding = true;
        log.error("[JOBS] error", {
          job: job.name,
          period,
          audience,
          err: errorMessage(err),
        });
        out.push({ job: job.name, period, audience, outcome: "error" });
      }
    }
    if (!outstanding) this.owed.delete(job.name);
    return out;
  }
}

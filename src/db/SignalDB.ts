import Database from "better-sqlite3";
import { z } from "zod";
import { StoreUnavailableError } from "../errors.js";
import {
  APPROVAL_STATUSES,
  SIGNAL_TYPES,
  TIER_ASSIGNMENTS,
  type ApprovalStatus,
  type Article,
  type Audience,
  type Signal,
} from "../types.js";
import type {
  DeliveryCounts,
  SignalStore,
  TerminalStatus,
  TransitionPatch,
} from "./store.js";

const SignalRow = z.object({
  id: z.string(),
  signal_type: z.enum(SIGNAL_TYPES),
  source: z.string(),
  title: z.string(),
  link: z.string(),
  content: z.string(),
  confidence: z.number(),
  detected_at: z.string(),
  prediction: z.string(),
  evidence: z.string(),
  matched_keywords: z.string(),
  approval_status: z.enum(APPROVAL_STATUSES),
  tier_assignment: z.enum(TIER_ASSIGNMENTS),
  sent_free: z.number(),
  sent_premium: z.number(),
  approved_at: z.string().nullable(),
  reject_reason: z.string().nullable(),
  sent_free_at: z.string().nullable(),
  sent_premium_at: z.string().nullable(),
  premium_attempts: z.number(),
  article_id: z.string().nullable(),
});

const StringList = z.array(z.string());
const CountRow = z.object({ n: z.number() });
const StatusCountRow = z.object({
  approval_status: z.enum(APPROVAL_STATUSES),
  n: z.number(),
});
const CursorRow = z.object({ value: z.string() });

function toSignal(raw: unknown): Signal {
  const r = SignalRow.parse(raw);
  return {
    id: r.id,
    signalType: r.signal_type,
    source: r.source,
    title: r.title,
    link: r.link,
    content: r.content,
    confidence: r.confidence,
    detectedAt: r.detected_at,
    prediction: r.prediction,
    evidence: StringList.parse(JSON.parse(r.evidence)),
    matchedKeywords: StringList.parse(JSON.parse(r.matched_keywords)),
    approvalStatus: r.approval_status,
    tierAssignment: r.tier_assignment,
    sentFree: r.sent_free === 1,
    sentPremium: r.sent_premium === 1,
    approvedAt: r.approved_at,
    rejectReason: r.reject_reason,
    sentFreeAt: r.sent_free_at,
    sentPremiumAt: r.sent_premium_at,
    premiumAttempts: r.premium_attempts,
    articleId: r.article_id,
  };
}

/** SQLite persistence, dedup ledger & delivery bookkeeping */
export class SignalDB implements SignalStore {
  private db: Database.Database;
  private q: Record<
    | "articleInsert"
    | "articleSeen"
    | "signalInsert"
    | "signalGet"
    | "transition"
    | "claimFree"
    | "claimPremium"
    | "markFree"
    | "markPremium"
    | "releaseFree"
    | "releasePremium"
    | "freeSends"
    | "freeCandidates"
    | "premiumCandidates"
    | "pending"
    | "approvedBetween"
    | "statusCounts"
    | "deliveryFree"
    | "deliveryPremium"
    | "jobSeen"
    | "jobInsert"
    | "cursorGet"
    | "cursorSet",
    Database.Statement
  >;

  constructor(path: string) {
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(`CREATE TABLE IF NOT EXISTS articles (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      source TEXT NOT NULL,
      link TEXT NOT NULL,
      published_date TEXT NOT NULL,
      processed INTEGER NOT NULL DEFAULT 1,
      created_at TEXT DEFAULT (datetime('now'))
    );
    CREATE TABLE IF NOT EXISTS signals (
      id TEXT PRIMARY KEY,
      signal_type TEXT NOT NULL,
      source TEXT NOT NULL,
      title TEXT NOT NULL,
      link TEXT NOT NULL,
      content TEXT NOT NULL,
      confidence REAL NOT NULL,
      detected_at TEXT NOT NULL,
      prediction TEXT NOT NULL,
      evidence TEXT NOT NULL,
      matched_keywords TEXT NOT NULL,
      approval_status TEXT NOT NULL DEFAULT 'pending',
      tier_assignment TEXT NOT NULL,
      sent_free INTEGER NOT NULL DEFAULT 0,
      sent_premium INTEGER NOT NULL DEFAULT 0,
      approved_at TEXT,
      reject_reason TEXT,
      sent_free_at TEXT,
      sent_premium_at TEXT,
      premium_attempts INTEGER NOT NULL DEFAULT 0,
      free_lease_until INTEGER,
      premium_lease_until INTEGER,
      article_id TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_signals_status ON signals (approval_status, detected_at);
    CREATE INDEX IF NOT EXISTS idx_signals_sent_free ON signals (sent_free, sent_free_at);
    CREATE TABLE IF NOT EXISTS job_runs (
      job TEXT NOT NULL,
      period TEXT NOT NULL,
      destination TEXT NOT NULL,
      ran_at TEXT NOT NULL,
      PRIMARY KEY (job, period, destination)
    );
    CREATE TABLE IF NOT EXISTS cursors (
      name TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );`);

    const approved = `approval_status IN ('approved','auto_approved')`;
    this.q = {
      articleInsert: this.db.prepare(`INSERT OR IGNORE INTO articles
        (id, title, source, link, published_date, processed)
        VALUES (@id, @title, @source, @link, @published_date, @processed)`),
      articleSeen: this.db.prepare("SELECT 1 FROM articles WHERE id=?"),
      signalInsert: this.db.prepare(`INSERT OR IGNORE INTO signals
        (id, signal_type, source, title, link, content, confidence, detected_at,
         prediction, evidence, matched_keywords, approval_status, tier_assignment,
         sent_free, sent_premium, approved_at, reject_reason, sent_free_at,
         sent_premium_at, premium_attempts, article_id)
        VALUES (@id, @signal_type, @source, @title, @link, @content, @confidence,
         @detected_at, @prediction, @evidence, @matched_keywords, @approval_status,
         @tier_assignment, @sent_free, @sent_premium, @approved_at, @reject_reason,
         @sent_free_at, @sent_premium_at, @premium_attempts, @article_id)`),
      signalGet: this.db.prepare("SELECT * FROM signals WHERE id=?"),
      transition: this.db.prepare(`UPDATE signals SET
          approval_status=@to,
          approved_at=@at,
          tier_assignment=COALESCE(@tier, tier_assignment),
          reject_reason=@reject_reason
        WHERE id=@id AND approval_status='pending'`),
      claimFree: this.db.prepare(`UPDATE signals SET free_lease_until=@until
        WHERE id=@id AND sent_free=0 AND ${approved}
          AND (free_lease_until IS NULL OR free_lease_until < @now)`),
      claimPremium: this.db.prepare(`UPDATE signals SET premium_lease_until=@until,
          premium_attempts=premium_attempts + 1
        WHERE id=@id AND sent_premium=0 AND ${approved}
          AND (premium_lease_until IS NULL OR premium_lease_until < @now)`),
      markFree: this.db.prepare(`UPDATE signals SET sent_free=1, sent_free_at=@at,
          free_lease_until=NULL
        WHERE id=@id AND sent_free=0 AND ${approved}`),
      markPremium: this.db.prepare(`UPDATE signals SET sent_premium=1,
          sent_premium_at=@at, premium_lease_until=NULL
        WHERE id=@id AND sent_premium=0 AND ${approved}`),
      releaseFree: this.db.prepare(
        "UPDATE signals SET free_lease_until=NULL WHERE id=? AND sent_free=0"
      ),
      releasePremium: this.db.prepare(
        "UPDATE signals SET premium_lease_until=NULL WHERE id=? AND sent_premium=0"
      ),
      freeSends: this.db.prepare(`SELECT COUNT(*) AS n FROM signals
        WHERE sent_free=1 AND sent_free_at >= ? AND sent_free_at <= ?`),
      freeCandidates: this.db.prepare(`SELECT * FROM signals
        WHERE ${approved} AND tier_assignment IN ('free','both') AND sent_free=0
          AND detected_at >= ?
        ORDER BY detected_at ASC`),
      premiumCandidates: this.db.prepare(`SELECT * FROM signals
        WHERE ${approved} AND tier_assignment IN ('premium','both')
          AND sent_premium=0 AND detected_at >= ? AND premium_attempts < ?
        ORDER BY detected_at ASC`),
      pending: this.db.prepare(`SELECT * FROM signals
        WHERE approval_status='pending' ORDER BY detected_at DESC LIMIT ?`),
      approvedBetween: this.db.prepare(`SELECT * FROM signals
        WHERE ${approved} AND detected_at >= ? AND detected_at < ?
        ORDER BY confidence DESC, detected_at ASC`),
      statusCounts: this.db.prepare(
        "SELECT approval_status, COUNT(*) AS n FROM signals GROUP BY approval_status"
      ),
      deliveryFree: this.db.prepare(
        "SELECT COUNT(*) AS n FROM signals WHERE sent_free=1"
      ),
      deliveryPremium: this.db.prepare(
        "SELECT COUNT(*) AS n FROM signals WHERE sent_premium=1"
      ),
      jobSeen: this.db.prepare(
        "SELECT 1 FROM job_runs WHERE job=? AND period=? AND destination=?"
      ),
      jobInsert: this.db.prepare(`INSERT OR IGNORE INTO job_runs
        (job, period, destination, ran_at) VALUES (?, ?, ?, ?)`),
      cursorGet: this.db.prepare("SELECT value FROM cursors WHERE name=?"),
      cursorSet: this.db.prepare(`INSERT INTO cursors (name, value) VALUES (?, ?)
        ON CONFLICT(name) DO UPDATE SET value=excluded.value`),
    };
  }

  /** Every SQLite failure surfaces as StoreUnavailable to the caller. */
  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      throw new StoreUnavailableError(op, err);
    }
  }

  insertArticleIfAbsent(a: Article) {
    return this.guard("insertArticle", () => {
      const res = this.q.articleInsert.run({
        id: a.id,
        title: a.title,
        source: a.source,
        link: a.link,
        published_date: a.publishedDate,
        processed: a.processed ? 1 : 0,
      });
      return res.changes === 1;
    });
  }

  hasArticle(id: string) {
    return this.guard("hasArticle", () => !!this.q.articleSeen.get(id));
  }

  insertSignal(s: Signal) {
    return this.guard("insertSignal", () => {
      const res = this.q.signalInsert.run({
        id: s.id,
        signal_type: s.signalType,
        source: s.source,
        title: s.title,
        link: s.link,
        content: s.content,
        confidence: s.confidence,
        detected_at: s.detectedAt,
        prediction: s.prediction,
        evidence: JSON.stringify(s.evidence),
        matched_keywords: JSON.stringify(s.matchedKeywords),
        approval_status: s.approvalStatus,
        tier_assignment: s.tierAssignment,
        sent_free: s.sentFree ? 1 : 0,
        sent_premium: s.sentPremium ? 1 : 0,
        approved_at: s.approvedAt,
        reject_reason: s.rejectReason,
        sent_free_at: s.sentFreeAt,
        sent_premium_at: s.sentPremiumAt,
        premium_attempts: s.premiumAttempts,
        article_id: s.articleId,
      });
      return res.changes === 1;
    });
  }

  getSignal(id: string) {
    return this.guard("getSignal", () => {
      const row = this.q.signalGet.get(id);
      return row ? toSignal(row) : null;
    });
  }

  transition(
    id: string,
    to: TerminalStatus,
    at: string,
    patch: TransitionPatch = {}
  ) {
    return this.guard("transition", () =>
      this.db.transaction(() => {
        const res = this.q.transition.run({
          id,
          to,
          at,
          tier: patch.tier ?? null,
          reject_reason: patch.rejectReason ?? null,
        });
        if (res.changes !== 1) return null;
        return toSignal(this.q.signalGet.get(id));
      })()
    );
  }

  claimDelivery(
    id: string,
    audience: Audience,
    nowMs: number,
    leaseUntilMs: number
  ) {
    const stmt = audience === "free" ? this.q.claimFree : this.q.claimPremium;
    return this.guard(
      "claimDelivery",
      () => stmt.run({ id, now: nowMs, until: leaseUntilMs }).changes === 1
    );
  }

  markSent(id: string, audience: Audience, at: string) {
    const stmt = audience === "free" ? this.q.markFree : this.q.markPremium;
    return this.guard("markSent", () => stmt.run({ id, at }).changes === 1);
  }

  releaseDelivery(id: string, audience: Audience) {
    const stmt =
      audience === "free" ? this.q.releaseFree : this.q.releasePremium;
    this.guard("releaseDelivery", () => stmt.run(id));
  }

  countFreeSendsBetween(fromIso: string, toIso: string) {
    return this.guard(
      "countFreeSends",
      () => CountRow.parse(this.q.freeSends.get(fromIso, toIso)).n
    );
  }

  listFreeReleaseCandidates(detectedSinceIso: string) {
    return this.guard("listFreeReleaseCandidates", () =>
      this.q.freeCandidates.all(detectedSinceIso).map(toSignal)
    );
  }

  listPremiumRetryCandidates(detectedSinceIso: string, maxAttempts: number) {
    return this.guard("listPremiumRetryCandidates", () =>
      this.q.premiumCandidates.all(detectedSinceIso, maxAttempts).map(toSignal)
    );
  }

  listPending(limit: number) {
    return this.guard("listPending", () =>
      this.q.pending.all(limit).map(toSignal)
    );
  }

  listApprovedBetween(fromIso: string, toIso: string) {
    return this.guard("listApprovedBetween", () =>
      this.q.approvedBetween.all(fromIso, toIso).map(toSignal)
    );
  }

  statusCounts() {
    return this.guard("statusCounts", () => {
      const out: Record<ApprovalStatus, number> = {
        pending: 0,
        approved: 0,
        auto_approved: 0,
        rejected: 0,
      };
      for (const raw of this.q.statusCounts.all()) {
        const row = StatusCountRow.parse(raw);
        out[row.approval_status] = row.n;
      }
      return out;
    });
  }

  deliveryCounts(): DeliveryCounts {
    return this.guard("deliveryCounts", () => ({
      sentFree: CountRow.parse(this.q.deliveryFree.get()).n,
      sentPremium: CountRow.parse(this.q.deliveryPremium.get()).n,
    }));
  }

  hasJobRun(job: string, period: string, destination: string) {
    return this.guard(
      "hasJobRun",
      () => !!this.q.jobSeen.get(job, period, destination)
    );
  }

  recordJobRun(job: string, period: string, destination: string, at: string) {
    this.guard("recordJobRun", () =>
      this.q.jobInsert.run(job, period, destination, at)
    );
  }

  getCursor(name: string) {
    return this.guard("getCursor", () => {
      const row = this.q.cursorGet.get(name);
      return row ? CursorRow.parse(row).value : null;
    });
  }

  setCursor(name: string, value: string) {
    this.guard("setCursor", () => this.q.cursorSet.run(name, value));
  }

  close() {
    this.db.close();
  }
}

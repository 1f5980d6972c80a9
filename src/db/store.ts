import type {
  ApprovalStatus,
  Article,
  Audience,
  OverrideTier,
  Signal,
} from "../types.js";

export type TerminalStatus = Exclude<ApprovalStatus, "pending">;

export interface TransitionPatch {
  /** Replaces tier_assignment in the same write (operator override). */
  tier?: OverrideTier;
  rejectReason?: string;
}

export interface DeliveryCounts {
  sentFree: number;
  sentPremium: number;
}

/**
 * Persistence contract consumed by the core. Every method that changes a
 * signal is a compare-and-set: it checks its precondition and writes in one
 * statement and reports whether it applied.
 */
export interface SignalStore {
  /** Insert-if-absent; true when the row was new. */
  insertArticleIfAbsent(article: Article): boolean;
  hasArticle(id: string): boolean;

  /** False when the id is already taken. */
  insertSignal(signal: Signal): boolean;
  getSignal(id: string): Signal | null;
  /** pending → `to`; null when the signal is missing or not pending. */
  transition(
    id: string,
    to: TerminalStatus,
    at: string,
    patch?: TransitionPatch
  ): Signal | null;

  /** Take the delivery lease for one (signal, audience) pair. */
  claimDelivery(
    id: string,
    audience: Audience,
    nowMs: number,
    leaseUntilMs: number
  ): boolean;
  /** sent_* false → true; false when it was already true. */
  markSent(id: string, audience: Audience, at: string): boolean;
  releaseDelivery(id: string, audience: Audience): void;

  countFreeSendsBetween(fromIso: string, toIso: string): number;
  listFreeReleaseCandidates(detectedSinceIso: string): Signal[];
  listPremiumRetryCandidates(
    detectedSinceIso: string,
    maxAttempts: number
  ): Signal[];
  listPending(limit: number): Signal[];
  listApprovedBetween(fromIso: string, toIso: string): Signal[];
  statusCounts(): Record<ApprovalStatus, number>;
  deliveryCounts(): DeliveryCounts;

  hasJobRun(job: string, period: string, destination: string): boolean;
  recordJobRun(job: string, period: string, destination: string, at: string): void;

  getCursor(name: string): string | null;
  setCursor(name: string, value: string): void;

  close(): void;
}

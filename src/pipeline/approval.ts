import { createHash } from "crypto";
import type { SignalStore, TerminalStatus, TransitionPatch } from "../db/store.js";
import {
  AlreadyProcessedError,
  NotFoundError,
  SignalError,
  errorMessage,
  fail,
  ok,
  type OpResult,
} from "../errors.js";
import { log } from "../logger.js";
import type { PolicyConfig } from "../policy.js";
import type {
  ApprovalStatus,
  OverrideTier,
  Signal,
  SignalDraft,
} from "../types.js";
import type { DispatchCoordinator, DispatchReport } from "./dispatch.js";
import type { TierPolicy } from "./tierPolicy.js";

/** Suffixes tried when a content-derived id is already taken. */
const MAX_ID_ATTEMPTS = 10;
const ID_LENGTH = 12;

export interface CreateResult {
  signal: Signal;
  autoApproved: boolean;
  delivery?: DispatchReport;
}

export interface TransitionResult {
  signal: Signal;
  delivery?: DispatchReport;
}

export interface SignalStats {
  byStatus: Record<ApprovalStatus, number>;
  sentFree: number;
  sentPremium: number;
  weeklyFreeSends: number;
  weeklyFreeCap: number;
}

export interface ApprovalDeps {
  store: SignalStore;
  tierPolicy: TierPolicy;
  dispatcher: DispatchCoordinator;
  policy: PolicyConfig;
  clock?: () => Date;
}

export function signalId(
  d: Pick<SignalDraft, "source" | "content" | "detectedAt">,
  attempt = 0
) {
  const base = createHash("sha256")
    .update(`${d.source}|${d.content}|${d.detectedAt}`)
    .digest("hex")
    .slice(0, ID_LENGTH);
  return attempt === 0 ? base : `${base}-${attempt}`;
}

/**
 * Owns the approval lifecycle: pending → approved | auto_approved | rejected.
 * Every transition is a single compare-and-set on the store.
 */
export class ApprovalStateMachine {
  private readonly store: SignalStore;
  private readonly tierPolicy: TierPolicy;
  private readonly dispatcher: DispatchCoordinator;
  private readonly policy: PolicyConfig;
  private readonly clock: () => Date;

  constructor(deps: ApprovalDeps) {
    this.store = deps.store;
    this.tierPolicy = deps.tierPolicy;
    this.dispatcher = deps.dispatcher;
    this.policy = deps.policy;
    this.clock = deps.clock ?? (() => new Date());
  }

  private insertWithUniqueId(fields: Omit<Signal, "id">): Signal {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const signal: Signal = { ...fields, id: signalId(fields, attempt) };
      if (this.store.insertSignal(signal)) return signal;
      log.warn("[SIGNAL] id collision", { id: signal.id, attempt });
    }
    throw new Error(
      `could not allocate a signal id after ${MAX_ID_ATTEMPTS} attempts`
    );
  }

  async create(draft: SignalDraft): Promise<CreateResult> {
    const signal = this.insertWithUniqueId({
      ...draft,
      approvalStatus: "pending",
      tierAssignment: this.tierPolicy.decide(draft),
      sentFree: false,
      sentPremium: false,
      approvedAt: null,
      rejectReason: null,
      sentFreeAt: null,
      sentPremiumAt: null,
      premiumAttempts: 0,
    });
    log.info("[SIGNAL] created", {
      id: signal.id,
      type: signal.signalType,
      confidence: signal.confidence,
      tier: signal.tierAssignment,
    });

    if (signal.confidence < this.policy.autoApproveThreshold) {
      return { signal, autoApproved: false };
    }

    const approved = this.store.transition(
      signal.id,
      "auto_approved",
      this.clock().toISOString()
    );
    if (!approved) return { signal, autoApproved: false };

    log.info("[SIGNAL] auto-approved", { id: signal.id });
    const delivery = await this.dispatcher.dispatchApproved(approved);
    return {
      signal: this.store.getSignal(signal.id) ?? approved,
      autoApproved: true,
      delivery,
    };
  }

  approve(id: string) {
    return this.apply(id, "approved");
  }

  /** Approve with the operator's tier instead of the computed one. */
  approveOverride(id: string, tier: OverrideTier) {
    return this.apply(id, "approved", { tier });
  }

  reject(id: string, reason: string) {
    return this.apply(id, "rejected", {
      rejectReason: reason.trim() || "unspecified",
    });
  }

  private async apply(
    id: string,
    to: TerminalStatus,
    patch: TransitionPatch = {}
  ): Promise<OpResult<TransitionResult>> {
    try {
      const updated = this.store.transition(
        id,
        to,
        this.clock().toISOString(),
        patch
      );
      if (!updated) {
        const existing = this.store.getSignal(id);
        return fail(
          existing
            ? new AlreadyProcessedError(id, existing.approvalStatus)
            : new NotFoundError(id)
        );
      }
      log.info("[SIGNAL] transition", {
        id,
        to,
        tier: updated.tierAssignment,
        reason: patch.rejectReason,
      });
      if (to === "rejected") return ok({ signal: updated });

      // the transition is committed; a failed dispatch is left to the
      // release scan and premium retry
      try {
        const delivery = await this.dispatcher.dispatchApproved(updated);
        return ok({ signal: this.store.getSignal(id) ?? updated, delivery });
      } catch (err) {
        log.error("[SIGNAL] dispatch after approval failed", {
          id,
          err: errorMessage(err),
        });
        return ok({ signal: updated });
      }
    } catch (err) {
      if (err instanceof SignalError) return fail(err);
      throw err;
    }
  }

  get(id: string): OpResult<Signal> {
    try {
      const s = this.store.getSignal(id);
      return s ? ok(s) : fail(new NotFoundError(id));
    } catch (err) {
      if (err instanceof SignalError) return fail(err);
      throw err;
    }
  }

  listPending(limit = 10): OpResult<Signal[]> {
    try {
      return ok(this.store.listPending(limit));
    } catch (err) {
      if (err instanceof SignalError) return fail(err);
      throw err;
    }
  }

  stats(now: Date = this.clock()): OpResult<SignalStats> {
    try {
      const delivered = this.store.deliveryCounts();
      return ok({
        byStatus: this.store.statusCounts(),
        sentFree: delivered.sentFree,
        sentPremium: delivered.sentPremium,
        weeklyFreeSends: this.dispatcher.weeklyFreeSends(now),
        weeklyFreeCap: this.policy.weeklyFreeCap,
      });
    } catch (err) {
      if (err instanceof SignalError) return fail(err);
      throw err;
    }
  }
}

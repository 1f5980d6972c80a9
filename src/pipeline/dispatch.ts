import type { SignalStore } from "../db/store.js";
import {
  ConfigurationMissingError,
  StoreUnavailableError,
  TransportFailureError,
  errorMessage,
} from "../errors.js";
import { log } from "../logger.js";
import { renderFree, renderPremium } from "../notify/templates.js";
import { sendWithTimeout, type Transport } from "../notify/transport.js";
import { DAY_MS, HOUR_MS, type PolicyConfig } from "../policy.js";
import {
  includesFree,
  includesPremium,
  isApproved,
  type Audience,
  type Signal,
} from "../types.js";
import type { ReleaseDecision, TierPolicy } from "./tierPolicy.js";

export type DeliveryOutcome =
  | "sent"
  | "already_sent"
  | "in_flight" // another worker holds the delivery lease
  | "unconfigured"
  | "failed"
  | "not_eligible"
  | "withheld";

export type Destinations = Partial<Record<Audience, string>>;

export interface DispatchReport {
  premium?: DeliveryOutcome;
  free?: DeliveryOutcome;
  freeDecision?: ReleaseDecision;
}

export interface ScanReport {
  scanned: number;
  sent: number;
  withheld: number;
  failed: number;
  errors: number;
}

export interface DispatchDeps {
  store: SignalStore;
  transport: Transport;
  tierPolicy: TierPolicy;
  policy: PolicyConfig;
  destinations: Destinations;
  clock?: () => Date;
}

const emptyScan = (): ScanReport => ({
  scanned: 0,
  sent: 0,
  withheld: 0,
  failed: 0,
  errors: 0,
});

/** Renders and transmits approved signals; one send per (signal, audience). */
export class DispatchCoordinator {
  private readonly store: SignalStore;
  private readonly transport: Transport;
  private readonly tierPolicy: TierPolicy;
  private readonly policy: PolicyConfig;
  private readonly destinations: Destinations;
  private readonly clock: () => Date;
  /** Serializes free releases so the weekly cap is read and spent in order. */
  private freeChain: Promise<unknown> = Promise.resolve();

  constructor(deps: DispatchDeps) {
    this.store = deps.store;
    this.transport = deps.transport;
    this.tierPolicy = deps.tierPolicy;
    this.policy = deps.policy;
    this.destinations = deps.destinations;
    this.clock = deps.clock ?? (() => new Date());
  }

  /** Free sends dispatched in the trailing 7 days. */
  weeklyFreeSends(now: Date = this.clock()) {
    return this.store.countFreeSendsBetween(
      new Date(now.getTime() - 7 * DAY_MS).toISOString(),
      now.toISOString()
    );
  }

  async sendToTier(signal: Signal, audience: Audience): Promise<DeliveryOutcome> {
    const alreadySent = audience === "free" ? signal.sentFree : signal.sentPremium;
    if (alreadySent) return "already_sent";

    const destination = this.destinations[audience];
    if (!destination) {
      const missing = new ConfigurationMissingError(`${audience} destination`);
      log.warn("[DISPATCH] skipped", { id: signal.id, reason: missing.message });
      return "unconfigured";
    }

    const now = this.clock();
    const claimed = this.store.claimDelivery(
      signal.id,
      audience,
      now.getTime(),
      now.getTime() + this.policy.deliveryLeaseSeconds * 1000
    );
    if (!claimed) {
      const current = this.store.getSignal(signal.id);
      if (!current || !isApproved(current)) return "not_eligible";
      const sent = audience === "free" ? current.sentFree : current.sentPremium;
      return sent ? "already_sent" : "in_flight";
    }

    const message = audience === "free" ? renderFree(signal) : renderPremium(signal);
    const res = await sendWithTimeout(
      this.transport,
      destination,
      message,
      this.policy.transportTimeoutMs
    );
    if (!res.ok) {
      this.store.releaseDelivery(signal.id, audience);
      const failure = new TransportFailureError(destination, res.reason);
      log.warn("[DISPATCH] not sent", {
        id: signal.id,
        audience,
        reason: failure.message,
      });
      return "failed";
    }

    this.store.markSent(signal.id, audience, this.clock().toISOString());
    log.info("[DISPATCH] sent", { id: signal.id, audience, destination });
    return "sent";
  }

  /** Free release through the TierPolicy gate. */
  releaseFree(
    signal: Signal
  ): Promise<{ outcome: DeliveryOutcome; decision: ReleaseDecision }> {
    const run = async () => {
      const now = this.clock();
      const decision = this.tierPolicy.shouldReleaseToFree(
        signal,
        now,
        this.weeklyFreeSends(now)
      );
      if (!decision.send) {
        log.debug("[DISPATCH] free withheld", { id: signal.id, ...decision });
        return { outcome: "withheld" as const, decision };
      }
      return { outcome: await this.sendToTier(signal, "free"), decision };
    };
    const next = this.freeChain.then(run, run);
    this.freeChain = next.catch(() => undefined);
    return next;
  }

  /** Called right after approval: premium now, free through the delay gate. */
  async dispatchApproved(signal: Signal): Promise<DispatchReport> {
    const report: DispatchReport = {};
    if (!isApproved(signal)) return report;
    if (includesPremium(signal.tierAssignment))
      report.premium = await this.sendToTier(signal, "premium");
    if (includesFree(signal.tierAssignment)) {
      const { outcome, decision } = await this.releaseFree(signal);
      report.free = outcome;
      report.freeDecision = decision;
    }
    return report;
  }

  /** Re-checks every approved, unsent free-tier signal inside the release window. */
  async scanDelayedReleases(): Promise<ScanReport> {
    const now = this.clock();
    const since = new Date(
      now.getTime() - this.policy.releaseWindowDays * DAY_MS
    ).toISOString();
    const report = emptyScan();

    for (const signal of this.store.listFreeReleaseCandidates(since)) {
      report.scanned++;
      try {
        const { outcome } = await this.releaseFree(signal);
        if (outcome === "sent") report.sent++;
        else if (outcome === "failed") report.failed++;
        else report.withheld++;
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        report.errors++;
        log.error("[DISPATCH] free release error", {
          id: signal.id,
          err: errorMessage(err),
        });
      }
    }
    return report;
  }

  /** Bounded re-attempt of premium sends that failed at approval time. */
  async retryPremium(): Promise<ScanReport> {
    const report = emptyScan();
    if (!this.destinations.premium) return report;

    const now = this.clock();
    const since = new Date(
      now.getTime() - this.policy.premiumRetryWindowHours * HOUR_MS
    ).toISOString();
    const candidates = this.store.listPremiumRetryCandidates(
      since,
      this.policy.premiumMaxAttempts
    );

    for (const signal of candidates) {
      report.scanned++;
      try {
        const outcome = await this.sendToTier(signal, "premium");
        if (outcome === "sent") report.sent++;
        else if (outcome === "failed") report.failed++;
        else report.withheld++;
      } catch (err) {
        if (err instanceof StoreUnavailableError) throw err;
        report.errors++;
        log.error("[DISPATCH] premium retry error", {
          id: signal.id,
          err: errorMessage(err),
        });
      }
    }
    return report;
  }
}

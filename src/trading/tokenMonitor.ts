import { Logger } from "../core/logger.js";
import { Clock, systemClock } from "../core/scheduler.js";
import { Notifier } from "../core/telegramNotifier.js";
import { CandidateToken } from "../core/types.js";
import { describeError } from "../rpc/errors.js";
import { SubscriberRegistry } from "../storage/subscriberRegistry.js";
import { RiskClassifier } from "./riskClassifier.js";

// Cycles in which every buy alert failed before the candidate is given up.
export const MAX_ALERT_ATTEMPTS = 3;

export interface CandidateFeed {
  poll(): Promise<CandidateToken[]>;
}

export interface CycleReport {
  discovered: number;
  classified: string[];
  rejected: string[];
  expired: string[];
  undelivered: string[];
  pending: number;
}

/**
 * Owns the set of monitored candidates. Each cycle it pulls new pairs from
 * discovery, re-runs the risk checks on everything still pending and drops
 * candidates that reached a terminal outcome.
 */
export class TokenMonitor {
  private readonly discovery: CandidateFeed;
  private readonly classifier: RiskClassifier;
  private readonly registry: SubscriberRegistry;
  private readonly notifier: Notifier;
  private readonly log: Logger;
  private readonly clock: Clock;
  private candidates: CandidateToken[] = [];
  private readonly failedAlerts = new Map<string, number>();

  constructor(
    discovery: CandidateFeed,
    classifier: RiskClassifier,
    registry: SubscriberRegistry,
    notifier: Notifier,
    log: Logger,
    clock: Clock = systemClock
  ) {
    this.discovery = discovery;
    this.classifier = classifier;
    this.registry = registry;
    this.notifier = notifier;
    this.log = log;
    this.clock = clock;
  }

  getCandidates(): readonly CandidateToken[] {
    return this.candidates;
  }

  async tick(): Promise<CycleReport> {
    const discovered = await this.discovery.poll();
    const known = new Set(this.candidates.map((candidate) => candidate.pairAddress.toLowerCase()));
    for (const candidate of discovered) {
      if (!known.has(candidate.pairAddress.toLowerCase())) {
        this.candidates.push(candidate);
        this.log.info({ pair: candidate.pairAddress, contract: candidate.contractAddress }, "Monitoring new pair");
      }
    }

    const report: CycleReport = {
      discovered: discovered.length,
      classified: [],
      rejected: [],
      expired: [],
      undelivered: [],
      pending: 0
    };
    const nowSeconds = Math.floor(this.clock.now() / 1000);
    const retained: CandidateToken[] = [];

    for (const candidate of this.candidates) {
      if (!candidate.toBuy) {
        const decision = await this.classifier.evaluate(candidate, nowSeconds);
        if (decision.status === "rejected") {
          this.log.info({ pair: candidate.pairAddress, reason: decision.reason }, "Candidate rejected");
          report.rejected.push(candidate.pairAddress);
          continue;
        }
        if (decision.status === "expired") {
          this.log.info({ pair: candidate.pairAddress }, "Candidate expired without renouncement");
          report.expired.push(candidate.pairAddress);
          continue;
        }
        if (decision.status === "pending") {
          retained.push(candidate);
          continue;
        }
      }

      const key = candidate.pairAddress.toLowerCase();
      if (await this.alert(candidate)) {
        this.failedAlerts.delete(key);
        report.classified.push(candidate.pairAddress);
        continue;
      }
      const attempts = (this.failedAlerts.get(key) ?? 0) + 1;
      if (attempts >= MAX_ALERT_ATTEMPTS) {
        this.failedAlerts.delete(key);
        this.log.warn({ pair: candidate.pairAddress, attempts }, "Giving up on buy alert");
        report.undelivered.push(candidate.pairAddress);
        continue;
      }
      this.failedAlerts.set(key, attempts);
      retained.push(candidate);
    }

    this.candidates = retained;
    report.pending = retained.length;
    return report;
  }

  /** False only when every delivery failed; the alert is retried on later cycles up to MAX_ALERT_ATTEMPTS. */
  private async alert(candidate: CandidateToken): Promise<boolean> {
    const recipients = this.registry.autoSnipeSubscribers();
    if (recipients.length === 0) {
      this.log.info({ pair: candidate.pairAddress }, "Candidate passed screening, no auto-snipe subscribers");
      return true;
    }
    let delivered = 0;
    for (const subscriber of recipients) {
      try {
        await this.notifier.notifyCandidateToBuy(subscriber, candidate);
        delivered += 1;
      } catch (error) {
        this.log.warn({ subscriber, pair: candidate.pairAddress, error: describeError(error) }, "Buy alert failed");
      }
    }
    return delivered > 0;
  }
}

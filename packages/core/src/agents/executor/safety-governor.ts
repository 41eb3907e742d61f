/**
 * Safety Governor
 * Global hourly rate limit plus per-resource cooldown in front of every
 * cluster mutation
 */

import { createChildLogger, type GovernorStats } from '@kubemend/shared';
import type { SafetyDecision, SafetyGovernorConfig } from './types.js';

const logger = createChildLogger({ component: 'SafetyGovernor' });

const RATE_WINDOW_MS = 3600000; // trailing hour

/**
 * Owns the rate ledger and the cooldown map. Both are written only here,
 * and only when a request is approved.
 */
export class SafetyGovernor {
  private config: SafetyGovernorConfig;
  /** Approval timestamps, oldest first */
  private ledger: number[] = [];
  /** Resource key → last approval timestamp */
  private lastApproval: Map<string, number> = new Map();

  constructor(config: SafetyGovernorConfig) {
    this.config = config;
  }

  /**
   * Decide on an action against `key`, recording the approval if granted
   */
  tryApprove(key: string): SafetyDecision {
    const now = Date.now();
    this.pruneLedger(now);

    if (this.ledger.length >= this.config.maxActionsPerHour) {
      const oldest = this.ledger[0] ?? now;
      logger.warn(
        { resourceKey: key, actionsLastHour: this.ledger.length, maxActionsPerHour: this.config.maxActionsPerHour },
        'Rate limit reached'
      );
      return { approved: false, reason: 'rate_limited', retryAfterMs: oldest + RATE_WINDOW_MS - now };
    }

    const cooldownMs = this.config.cooldownSeconds * 1000;
    const last = this.lastApproval.get(key);
    if (last !== undefined && now - last < cooldownMs) {
      const retryAfterMs = cooldownMs - (now - last);
      logger.info(
        { resourceKey: key, remainingSeconds: Math.ceil(retryAfterMs / 1000) },
        'Cooldown active for resource'
      );
      return { approved: false, reason: 'cooldown', retryAfterMs };
    }

    this.ledger.push(now);
    this.lastApproval.set(key, now);
    logger.debug({ resourceKey: key, actionsLastHour: this.ledger.length }, 'Action approved');

    return { approved: true };
  }

  /**
   * Current stats for the status surface
   */
  getStats(): GovernorStats {
    this.pruneLedger(Date.now());
    return {
      actionsLastHour: this.ledger.length,
      maxActionsPerHour: this.config.maxActionsPerHour,
      cooldownSeconds: this.config.cooldownSeconds,
      trackedResources: this.lastApproval.size,
    };
  }

  private pruneLedger(now: number): void {
    const cutoff = now - RATE_WINDOW_MS;
    while (this.ledger.length > 0 && (this.ledger[0] ?? now) <= cutoff) {
      this.ledger.shift();
    }
  }
}

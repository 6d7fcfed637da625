/**
 * Pacing Controller
 *
 * Spaces provider operations per caller (tiered intervals) and applies
 * provider-issued backoff as one global pause for the shared connection.
 */

import { EventEmitter } from 'eventemitter3';

import type { Logger } from '../core/logger.js';
import type { CallerProfile } from './types.js';

export const DEFAULT_STANDARD_INTERVAL_MS = 3000;
export const DEFAULT_PRIVILEGED_INTERVAL_MS = 1000;
export const DEFAULT_BACKOFF_CAP_MS = 300_000;

export interface PacingOptions {
  standardIntervalMs?: number;
  privilegedIntervalMs?: number;
  backoffCapMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BackoffNotice {
  requestedMs: number;
  appliedMs: number;
  pausedUntil: number;
}

export interface PacingEvents {
  backoff: (notice: BackoffNotice) => void;
}

/** Shared by every worker using the same provider connection. */
export interface PacingState {
  pausedUntil: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class PacingController extends EventEmitter<PacingEvents> {
  readonly state: PacingState = { pausedUntil: 0 };
  private readonly standardIntervalMs: number;
  private readonly privilegedIntervalMs: number;
  private readonly backoffCapMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly logger: Logger,
    options: PacingOptions = {}
  ) {
    super();
    this.standardIntervalMs = options.standardIntervalMs ?? DEFAULT_STANDARD_INTERVAL_MS;
    this.privilegedIntervalMs = options.privilegedIntervalMs ?? DEFAULT_PRIVILEGED_INTERVAL_MS;
    this.backoffCapMs = options.backoffCapMs ?? DEFAULT_BACKOFF_CAP_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  intervalFor(caller: CallerProfile): number {
    if (caller.intervalOverrideMs !== null) {
      return caller.intervalOverrideMs;
    }
    return caller.tier === 'privileged' ? this.privilegedIntervalMs : this.standardIntervalMs;
  }

  /**
   * Suspend until the caller's interval has elapsed since its last operation
   * and no global backoff is in effect, then record the operation time.
   */
  async waitTurn(caller: CallerProfile): Promise<void> {
    await this.waitOutPause();

    const now = this.now();
    const slot =
      caller.lastOperationAt === null
        ? now
        : Math.max(now, caller.lastOperationAt + this.intervalFor(caller));
    // Reserve the slot before sleeping so a second batch of the same caller queues behind it.
    caller.lastOperationAt = slot;
    if (slot > now) {
      await this.sleep(slot - now);
    }

    await this.waitOutPause();
    caller.lastOperationAt = Math.max(caller.lastOperationAt, this.now());
  }

  /**
   * Pause every caller for `min(durationMs, cap)`. Reports of an overlapping
   * backoff extend the same deadline instead of adding up. Never throws.
   */
  async onProviderBackoff(durationMs: number): Promise<void> {
    try {
      const requestedMs = Number.isFinite(durationMs) && durationMs > 0 ? durationMs : 0;
      const appliedMs = Math.min(requestedMs, this.backoffCapMs);
      const until = this.now() + appliedMs;
      if (until > this.state.pausedUntil) {
        this.state.pausedUntil = until;
        this.logger.warn('Provider backoff in effect', { requestedMs, appliedMs });
        this.emit('backoff', { requestedMs, appliedMs, pausedUntil: until });
      }
      await this.waitOutPause();
    } catch (error) {
      this.logger.error('Backoff handling failed', error);
    }
  }

  isPaused(): boolean {
    return this.state.pausedUntil > this.now();
  }

  private async waitOutPause(): Promise<void> {
    let remaining = this.state.pausedUntil - this.now();
    while (remaining > 0) {
      await this.sleep(remaining);
      remaining = this.state.pausedUntil - this.now();
    }
  }
}

/**
 * Batch Orchestrator
 *
 * Drives the relay engine over a message range: strictly sequential and
 * ascending, one automatic retry after a provider backoff, periodic progress.
 */

import type { ResolveError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import type { CallerRegistry } from './callers.js';
import type { RelayStrategyEngine } from './engine.js';
import type { PacingController } from './pacing.js';
import { describeConversationRef } from './reference.js';
import type { ConversationResolver } from './resolver.js';
import {
  emptyBatchResult,
  tallyOutcome,
  type BatchResult,
  type CallerProfile,
  type MessageRange,
  type RelayMode,
  type RelayOutcome,
  type ResolvedConversation,
} from './types.js';

export const DEFAULT_PROGRESS_EVERY = 10;
export const DEFAULT_BACKOFF_MS = 5000;

export type BatchEvent =
  | { type: 'started'; range: MessageRange; conversation: ResolvedConversation; total: number }
  | { type: 'rejected'; range: MessageRange; error: ResolveError }
  | { type: 'backoff'; range: MessageRange; messageId: number; waitMs: number; reason: string }
  | {
      type: 'progress';
      range: MessageRange;
      processed: number;
      total: number;
      tally: BatchResult;
      last: RelayOutcome;
    }
  | { type: 'result'; range: MessageRange; result: BatchResult; cancelled: boolean };

export interface OutcomeSink {
  append(outcome: RelayOutcome): void;
}

export interface BatchDependencies {
  resolver: ConversationResolver;
  pacing: PacingController;
  engine: RelayStrategyEngine;
  outcomes: OutcomeSink;
  callers: CallerRegistry;
  logger: Logger;
}

export interface BatchOrchestratorOptions {
  progressEvery?: number;
  defaultBackoffMs?: number;
  now?: () => number;
  onOutcome?: (outcome: RelayOutcome) => void;
}

export interface BatchRunOptions {
  mode?: RelayMode;
  signal?: AbortSignal;
}

export class BatchOrchestrator {
  private readonly progressEvery: number;
  private readonly defaultBackoffMs: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: BatchDependencies,
    private readonly options: BatchOrchestratorOptions = {}
  ) {
    this.progressEvery = Math.max(1, options.progressEvery ?? DEFAULT_PROGRESS_EVERY);
    this.defaultBackoffMs = options.defaultBackoffMs ?? DEFAULT_BACKOFF_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run a batch to completion and return the aggregated counts.
   */
  async process(
    range: MessageRange,
    target: string,
    caller: CallerProfile,
    options: BatchRunOptions = {}
  ): Promise<BatchResult> {
    const events = this.run(range, target, caller, options);
    let step = await events.next();
    while (!step.done) {
      step = await events.next();
    }
    return step.value;
  }

  /**
   * Streaming form of `process`: yields progress events while the batch runs
   * and returns the final counts.
   */
  async *run(
    range: MessageRange,
    target: string,
    caller: CallerProfile,
    options: BatchRunOptions = {}
  ): AsyncGenerator<BatchEvent, BatchResult, void> {
    const { logger } = this.deps;
    const mode = options.mode ?? 'forward';
    const total = range.endId - range.startId + 1;
    const label = describeConversationRef(range.conversation);

    let initial = await this.deps.resolver.resolve(range.conversation);
    if (!initial.ok && initial.error.kind === 'Transient') {
      const waitMs = initial.error.retryAfterMs ?? this.defaultBackoffMs;
      yield { type: 'backoff', range, messageId: range.startId, waitMs, reason: initial.error.detail };
      await this.deps.pacing.onProviderBackoff(waitMs);
      initial = await this.deps.resolver.resolve(range.conversation);
    }
    if (!initial.ok) {
      logger.warn('Batch rejected: conversation unavailable', {
        conversation: label,
        kind: initial.error.kind,
        detail: initial.error.detail,
      });
      const result: BatchResult = { total, successful: 0, failed: total, restrictedCount: 0 };
      yield { type: 'rejected', range, error: initial.error };
      yield { type: 'result', range, result, cancelled: false };
      return result;
    }

    const conversationId = initial.value.canonicalId;
    yield { type: 'started', range, conversation: initial.value, total };
    logger.info('Batch started', {
      conversation: label,
      startId: range.startId,
      endId: range.endId,
      truncated: range.truncated,
      caller: caller.id,
      mode,
    });

    const tally = emptyBatchResult();
    let cancelled = false;
    for (let messageId = range.startId; messageId <= range.endId; messageId += 1) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }

      let attempted = await this.attempt(range, conversationId, messageId, target, caller, mode);
      if (attempted.ok && attempted.value.status === 'transient_error') {
        const waitMs = attempted.value.retryAfterMs ?? this.defaultBackoffMs;
        yield { type: 'backoff', range, messageId, waitMs, reason: attempted.value.reason };
        await this.deps.pacing.onProviderBackoff(waitMs);
        attempted = await this.attempt(range, conversationId, messageId, target, caller, mode);
      }

      if (!attempted.ok) {
        // Access was lost mid-batch: the rest of the range fails without further lookups.
        const remaining = range.endId - messageId + 1;
        tally.total += remaining;
        tally.failed += remaining;
        logger.warn('Batch stopped: conversation no longer available', {
          conversation: label,
          messageId,
          kind: attempted.error.kind,
          detail: attempted.error.detail,
        });
        yield { type: 'rejected', range, error: attempted.error };
        break;
      }

      const outcome = attempted.value;
      this.record(outcome, caller);
      tallyOutcome(tally, outcome);

      if (outcome.status === 'transient_error') {
        // Still throttled after the retry: give up on this id, but let the pause
        // run before the next one.
        await this.deps.pacing.onProviderBackoff(outcome.retryAfterMs ?? this.defaultBackoffMs);
      }

      if (tally.total % this.progressEvery === 0 && tally.total < total) {
        yield { type: 'progress', range, processed: tally.total, total, tally: { ...tally }, last: outcome };
      }
    }

    logger.info('Batch finished', { conversation: label, ...tally, cancelled });
    yield { type: 'result', range, result: { ...tally }, cancelled };
    return tally;
  }

  private async attempt(
    range: MessageRange,
    conversationId: number,
    messageId: number,
    target: string,
    caller: CallerProfile,
    mode: RelayMode
  ): Promise<Result<RelayOutcome, ResolveError>> {
    // Cached after the first item; re-resolves after TTL expiry or invalidation.
    const resolved = await this.deps.resolver.resolve(range.conversation);
    if (!resolved.ok) {
      const error = resolved.error;
      if (error.kind !== 'Transient') {
        return err(error);
      }
      return ok({
        conversationId,
        messageId,
        targetId: target,
        status: 'transient_error',
        reason: error.detail,
        strategy: null,
        callerId: caller.id,
        timestamp: new Date(this.now()).toISOString(),
        retryAfterMs: error.retryAfterMs ?? null,
      });
    }

    await this.deps.pacing.waitTurn(caller);
    return ok(await this.deps.engine.relay(resolved.value, messageId, target, { mode, callerId: caller.id }));
  }

  private record(outcome: RelayOutcome, caller: CallerProfile): void {
    try {
      this.deps.outcomes.append(outcome);
    } catch (error) {
      this.deps.logger.error('Failed to append relay outcome', error, {
        conversationId: outcome.conversationId,
        messageId: outcome.messageId,
      });
    }
    this.deps.callers.recordOutcome(caller, outcome);
    this.options.onOutcome?.(outcome);
  }
}

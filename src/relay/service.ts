/**
 * Host-facing entry point: turns reference text into batches, streams their
 * events, and answers statistics queries from the outcome log.
 */

import { existsSync, readdirSync } from 'node:fs';

import type Database from 'better-sqlite3';
import { EventEmitter } from 'eventemitter3';

import type { CourierConfig } from '../core/config.js';
import type { ParseError, ResolveError } from '../core/errors.js';
import { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import { openDatabase } from '../memory/db.js';
import { OutcomeLog, type StatusCounts } from '../memory/outcome_log.js';
import { SettingsStore } from '../memory/settings.js';
import { callProvider } from '../provider/call.js';
import type { RelayProvider } from '../provider/types.js';
import { BatchOrchestrator, type BatchEvent } from './batch.js';
import { CallerRegistry } from './callers.js';
import { RelayStrategyEngine } from './engine.js';
import { PacingController, type BackoffNotice } from './pacing.js';
import { parseInviteLink, parsePublicName, parseReferences } from './reference.js';
import { ConversationResolver } from './resolver.js';
import {
  emptyBatchResult,
  type BatchResult,
  type CallerProfile,
  type ConversationRef,
  type MessageRange,
  type RelayMode,
  type RelayOutcome,
  type ResolvedConversation,
} from './types.js';

export const DEFAULT_STATISTICS_WINDOW_MS = 24 * 60 * 60 * 1000;

export type RelayEvent =
  | BatchEvent
  | { type: 'invalid'; error: ParseError }
  | { type: 'truncated'; range: MessageRange; requestedEndId: number; maxItems: number }
  | { type: 'summary'; result: BatchResult; batches: number; cancelled: boolean };

export interface RelayServiceEvents {
  outcome: (outcome: RelayOutcome) => void;
  backoff: (notice: BackoffNotice) => void;
}

export interface HandleReferenceOptions {
  mode?: RelayMode;
  signal?: AbortSignal;
}

export interface Statistics {
  windowMs: number;
  since: string;
  total: number;
  successful: number;
  failed: number;
  byStatus: StatusCounts;
  /** Files currently kept in the downloads directory. */
  downloads: number;
}

export interface RelayServiceDependencies {
  config: CourierConfig;
  provider: RelayProvider;
  logger: Logger;
  outcomeLog: OutcomeLog;
  settings?: SettingsStore | null;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RelayService extends EventEmitter<RelayServiceEvents> {
  readonly resolver: ConversationResolver;
  readonly pacing: PacingController;
  readonly callers: CallerRegistry;
  private readonly engine: RelayStrategyEngine;
  private readonly orchestrator: BatchOrchestrator;
  private readonly config: CourierConfig;
  private readonly provider: RelayProvider;
  private readonly logger: Logger;
  private readonly outcomeLog: OutcomeLog;
  private readonly now: () => number;

  constructor(deps: RelayServiceDependencies) {
    super();
    const { config, provider, logger } = deps;
    this.config = config;
    this.provider = provider;
    this.logger = logger;
    this.outcomeLog = deps.outcomeLog;
    this.now = deps.now ?? Date.now;

    this.resolver = new ConversationResolver(provider, logger.child({ component: 'resolver' }), {
      ttlMs: config.resolver.cacheTtlMs,
      scanLimit: config.resolver.scanLimit,
      callTimeoutMs: config.provider.callTimeoutMs,
      now: this.now,
    });
    this.pacing = new PacingController(logger.child({ component: 'pacing' }), {
      standardIntervalMs: config.pacing.standardIntervalMs,
      privilegedIntervalMs: config.pacing.privilegedIntervalMs,
      backoffCapMs: config.pacing.backoffCapMs,
      now: this.now,
      sleep: deps.sleep,
    });
    this.callers = new CallerRegistry(config.callers.privileged, deps.settings ?? null);
    this.engine = new RelayStrategyEngine(provider, this.resolver, logger.child({ component: 'engine' }), {
      callTimeoutMs: config.provider.callTimeoutMs,
      transferTimeoutMs: config.provider.transferTimeoutMs,
      maxMediaBytes: config.relay.maxMediaBytes,
      tempPath: config.storage.tempPath,
      downloadsPath: config.storage.downloadsPath,
      now: this.now,
    });
    this.orchestrator = new BatchOrchestrator(
      {
        resolver: this.resolver,
        pacing: this.pacing,
        engine: this.engine,
        outcomes: this.outcomeLog,
        callers: this.callers,
        logger: logger.child({ component: 'batch' }),
      },
      {
        progressEvery: config.batch.progressEvery,
        defaultBackoffMs: config.pacing.defaultBackoffMs,
        now: this.now,
        onOutcome: (outcome) => this.emit('outcome', outcome),
      }
    );

    this.pacing.on('backoff', (notice) => this.emit('backoff', notice));
  }

  /**
   * Relay every message referenced in `text` to `target`. Parse errors are
   * reported up front and never take a pacing slot; each valid reference runs
   * as its own batch, one after the other.
   */
  async *handleReference(
    text: string,
    target: string,
    callerId: string | number,
    options: HandleReferenceOptions = {}
  ): AsyncGenerator<RelayEvent, BatchResult, void> {
    const caller = this.callers.get(callerId);
    const maxItems = this.config.parser.maxRangeItems;
    const parsed = parseReferences(text, { maxRangeItems: maxItems });

    for (const error of parsed.errors) {
      yield { type: 'invalid', error };
    }

    const summary = emptyBatchResult();
    let batches = 0;
    let cancelled = false;
    for (const range of parsed.ranges) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }
      if (range.truncated) {
        yield { type: 'truncated', range, requestedEndId: range.requestedEndId, maxItems };
      }

      const batch = this.orchestrator.run(range, target, caller, options);
      let step = await batch.next();
      while (!step.done) {
        const event = step.value;
        if (event.type === 'result' && event.cancelled) {
          cancelled = true;
        }
        yield event;
        step = await batch.next();
      }

      batches += 1;
      summary.total += step.value.total;
      summary.successful += step.value.successful;
      summary.failed += step.value.failed;
      summary.restrictedCount += step.value.restrictedCount;
      if (cancelled) break;
    }

    yield { type: 'summary', result: { ...summary }, batches, cancelled };
    return summary;
  }

  getStatistics(windowMs: number = DEFAULT_STATISTICS_WINDOW_MS): Statistics {
    const since = new Date(this.now() - windowMs);
    const byStatus = this.outcomeLog.countByStatus(since);
    const total = Object.values(byStatus).reduce((sum, n) => sum + n, 0);
    return {
      windowMs,
      since: since.toISOString(),
      total,
      successful: byStatus.success,
      failed: total - byStatus.success,
      byStatus,
      downloads: this.countDownloads(),
    };
  }

  private countDownloads(): number {
    const directory = this.config.storage.downloadsPath;
    if (!existsSync(directory)) {
      return 0;
    }
    return readdirSync(directory, { withFileTypes: true }).filter((entry) => entry.isFile()).length;
  }

  /**
   * Explicit join step for private conversations (invite link) or public
   * names. On success the conversation is cached for later references.
   */
  async join(inviteOrName: string): Promise<Result<ResolvedConversation, ParseError | ResolveError>> {
    const invite = parseInviteLink(inviteOrName);
    let joinTarget: string;
    let ref: ConversationRef | undefined;
    if (invite.ok) {
      joinTarget = invite.value.link;
    } else {
      const name = parsePublicName(inviteOrName);
      if (!name.ok) {
        return err({ kind: 'InvalidFormat', input: inviteOrName.trim(), detail: 'expected an invite link or a public name' });
      }
      joinTarget = name.value;
      ref = { kind: 'name', username: name.value };
    }

    const joined = await callProvider('join', this.config.provider.callTimeoutMs, () =>
      this.provider.join(joinTarget)
    );
    if (!joined.ok) {
      const failure = joined.error;
      const errorRef: ConversationRef = ref ?? { kind: 'name', username: joinTarget };
      this.logger.warn('Join failed', { target: joinTarget, kind: failure.kind, detail: failure.detail });
      if (failure.kind === 'throttled' || failure.kind === 'timeout') {
        return err({ kind: 'Transient', ref: errorRef, detail: failure.detail, retryAfterMs: failure.retryAfterMs ?? null });
      }
      if (failure.kind === 'not_member' || failure.kind === 'restricted') {
        return err({ kind: 'NeedsMembership', ref: errorRef, detail: failure.detail });
      }
      return err({ kind: 'ResolutionFailed', ref: errorRef, detail: failure.detail });
    }

    const resolved = this.resolver.remember(joined.value, ref);
    this.logger.info('Joined conversation', { conversationId: resolved.canonicalId, title: resolved.displayName });
    return ok(resolved);
  }

  setPacingInterval(callerId: string | number, intervalMs: number | null): CallerProfile {
    if (intervalMs !== null && (!Number.isFinite(intervalMs) || intervalMs < 0)) {
      throw new RangeError(`Pacing interval must be a non-negative number, got ${intervalMs}`);
    }
    return this.callers.setIntervalOverride(callerId, intervalMs);
  }

  getCallerProfile(callerId: string | number): CallerProfile {
    return this.callers.get(callerId);
  }
}

export interface CreateRelayServiceOptions {
  logger?: Logger;
  db?: Database.Database;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function createRelayService(
  config: CourierConfig,
  provider: RelayProvider,
  options: CreateRelayServiceOptions = {}
): RelayService {
  const logger = options.logger ?? new Logger(config.logging.level);
  const db = options.db ?? openDatabase(config.storage.dbPath);
  return new RelayService({
    config,
    provider,
    logger,
    outcomeLog: new OutcomeLog(db),
    settings: new SettingsStore(db),
    now: options.now,
    sleep: options.sleep,
  });
}

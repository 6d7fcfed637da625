/**
 * Relay Strategy Engine
 *
 * Per-message state machine over the strategy table: try each applicable
 * strategy in order until one succeeds, abort on the first transient failure,
 * and classify the item when every strategy has failed.
 */

import {
  describeError,
  isResolutionClass,
  isTransient,
  type RelayError,
} from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import { callProvider } from '../provider/call.js';
import type { MessageContent, RelayProvider } from '../provider/types.js';
import {
  applicableStrategies,
  STRATEGY_TABLE,
  type RelayStrategy,
  type StrategyContext,
  type StrategyLimits,
} from './strategies.js';
import type {
  RelayMode,
  RelayOutcome,
  RelayStatus,
  ResolvedConversation,
  StrategyName,
} from './types.js';

/** What the engine reports back to the resolver about a conversation. */
export interface ResolutionSignals {
  invalidate(conversationId: number): void;
  markRestricted(conversationId: number): void;
}

export interface RelayEngineOptions extends Partial<StrategyLimits> {
  strategies?: readonly RelayStrategy[];
  now?: () => number;
}

export interface RelayRequest {
  mode?: RelayMode;
  callerId?: string | null;
}

const DEFAULT_LIMITS: StrategyLimits = {
  callTimeoutMs: 30_000,
  transferTimeoutMs: 10 * 60 * 1000,
  maxMediaBytes: 2 * 1024 * 1024 * 1024,
  tempPath: 'tmp/courier',
  downloadsPath: 'downloads',
};

function terminalStatus(error: RelayError): RelayStatus | null {
  switch (error.kind) {
    case 'not_found':
      return 'not_found';
    case 'too_large':
      return 'too_large';
    default:
      return null;
  }
}

export class RelayStrategyEngine {
  private readonly limits: StrategyLimits;
  private readonly strategies: readonly RelayStrategy[];
  private readonly now: () => number;

  constructor(
    private readonly provider: RelayProvider,
    private readonly signals: ResolutionSignals,
    private readonly logger: Logger,
    options: RelayEngineOptions = {}
  ) {
    this.limits = {
      callTimeoutMs: options.callTimeoutMs ?? DEFAULT_LIMITS.callTimeoutMs,
      transferTimeoutMs: options.transferTimeoutMs ?? DEFAULT_LIMITS.transferTimeoutMs,
      maxMediaBytes: options.maxMediaBytes ?? DEFAULT_LIMITS.maxMediaBytes,
      tempPath: options.tempPath ?? DEFAULT_LIMITS.tempPath,
      downloadsPath: options.downloadsPath ?? DEFAULT_LIMITS.downloadsPath,
    };
    this.strategies = options.strategies ?? STRATEGY_TABLE;
    this.now = options.now ?? Date.now;
  }

  async relay(
    conversation: ResolvedConversation,
    messageId: number,
    target: string,
    request: RelayRequest = {}
  ): Promise<RelayOutcome> {
    const mode = request.mode ?? 'forward';
    const outcome = (
      status: RelayStatus,
      reason: string,
      strategy: StrategyName | null,
      retryAfterMs: number | null = null
    ): RelayOutcome => ({
      conversationId: conversation.canonicalId,
      messageId,
      targetId: target,
      status,
      reason,
      strategy,
      callerId: request.callerId ?? null,
      timestamp: new Date(this.now()).toISOString(),
      ...(status === 'transient_error' ? { retryAfterMs } : {}),
    });

    const ctx = this.createContext(conversation, messageId, target, mode);
    const log = this.logger.child({ conversationId: conversation.canonicalId, messageId, mode });

    let lastFailure: { error: RelayError; strategy: StrategyName } | null = null;
    try {
      for (const strategy of applicableStrategies(ctx, this.strategies)) {
        const result = await strategy.run(ctx);
        if (result === null) {
          log.debug('Strategy not applicable', { strategy: strategy.name });
          continue;
        }
        if (result.ok) {
          log.debug('Strategy succeeded', { strategy: strategy.name });
          return outcome('success', result.value.detail, strategy.name);
        }

        const error = result.error;
        log.debug('Strategy failed', { strategy: strategy.name, kind: error.kind, detail: error.detail });

        if (isTransient(error)) {
          return outcome('transient_error', error.detail, strategy.name, error.retryAfterMs ?? null);
        }
        if (isResolutionClass(error)) {
          this.signals.invalidate(conversation.canonicalId);
          return outcome('fatal_error', `conversation no longer accessible: ${error.detail}`, strategy.name);
        }
        if (error.kind === 'restricted' && strategy.name === 'direct') {
          this.signals.markRestricted(conversation.canonicalId);
        }
        const terminal = terminalStatus(error);
        if (terminal) {
          return outcome(terminal, error.detail, strategy.name);
        }
        lastFailure = { error, strategy: strategy.name };
      }
    } catch (error) {
      log.error('Relay attempt failed unexpectedly', error);
      return outcome('fatal_error', describeError(error), null);
    }

    if (!lastFailure) {
      return outcome('fatal_error', `no strategy applies in ${mode} mode`, null);
    }
    const { error, strategy } = lastFailure;
    return outcome(error.kind === 'restricted' ? 'restricted' : 'fatal_error', error.detail, strategy);
  }

  private createContext(
    conversation: ResolvedConversation,
    messageId: number,
    target: string,
    mode: RelayMode
  ): StrategyContext {
    let loaded: Promise<Result<MessageContent, RelayError>> | null = null;
    const load = async (): Promise<Result<MessageContent, RelayError>> => {
      const fetched = await callProvider('fetchMessage', this.limits.callTimeoutMs, () =>
        this.provider.fetchMessage(conversation.handle, messageId)
      );
      if (!fetched.ok) return fetched;
      const message = fetched.value;
      if (!message) {
        return err({ kind: 'not_found', detail: `message ${messageId} not found`, retryAfterMs: null });
      }
      if (!message.media && !message.text && !message.caption) {
        return err({ kind: 'fatal', detail: `message ${messageId} has no relayable content`, retryAfterMs: null });
      }
      return ok(message);
    };

    return {
      conversation,
      messageId,
      target,
      mode,
      provider: this.provider,
      limits: this.limits,
      logger: this.logger,
      loadMessage: () => {
        if (!loaded) {
          loaded = load();
        }
        return loaded;
      },
    };
  }
}

/**
 * Courier - multi-strategy message relay engine
 *
 * Main entry point for the Courier library.
 */

import { loadConfig, type CourierConfig } from './core/config.js';
import type { ParseError, ResolveError } from './core/errors.js';
import type { Result } from './core/result.js';
import { closeDatabase } from './memory/db.js';
import type { RelayProvider } from './provider/types.js';
import {
  createRelayService,
  type HandleReferenceOptions,
  type RelayEvent,
  type RelayService,
  type Statistics,
} from './relay/service.js';
import type { BatchResult, CallerProfile, ResolvedConversation } from './relay/types.js';

export * from './relay/types.js';
export * from './core/errors.js';
export * from './core/result.js';
export { loadConfig, parseConfig, ConfigError, type CourierConfig } from './core/config.js';
export { Logger, createSilentLogger } from './core/logger.js';
export type * from './provider/types.js';
export { ProviderError, classifyProviderError } from './provider/errors.js';
export {
  parseReference,
  parseReferences,
  parseInviteLink,
  parsePublicName,
  canonicalConversationId,
} from './relay/reference.js';
export { ConversationResolver } from './relay/resolver.js';
export { PacingController, type BackoffNotice } from './relay/pacing.js';
export { RelayStrategyEngine } from './relay/engine.js';
export { STRATEGY_TABLE, type RelayStrategy } from './relay/strategies.js';
export { BatchOrchestrator, type BatchEvent } from './relay/batch.js';
export { OutcomeLog } from './memory/outcome_log.js';
export {
  RelayService,
  createRelayService,
  type RelayEvent,
  type Statistics,
  type HandleReferenceOptions,
} from './relay/service.js';

// Version
export const VERSION = '0.1.0';

/**
 * Courier client for programmatic access.
 *
 * @example
 * ```typescript
 * import { Courier } from 'courier';
 *
 * const courier = new Courier({ provider, configPath: '~/.courier/config.yaml' });
 * await courier.start();
 *
 * for await (const event of courier.handleReference('https://t.me/c/1234567/10-12', 'me', 42)) {
 *   console.log(event.type);
 * }
 * ```
 */
export class Courier {
  private configPath?: string;
  private provider: RelayProvider;
  private config?: CourierConfig;
  private service?: RelayService;
  private started = false;

  constructor(options: { provider: RelayProvider; configPath?: string }) {
    this.provider = options.provider;
    this.configPath = options.configPath;
  }

  /**
   * Load configuration and open the outcome store.
   */
  async start(): Promise<void> {
    if (this.started) {
      throw new Error('Courier already started');
    }
    this.config = loadConfig(this.configPath);
    this.service = createRelayService(this.config, this.provider);
    this.started = true;
  }

  async stop(): Promise<void> {
    if (!this.started) {
      return;
    }
    this.service?.removeAllListeners();
    this.service = undefined;
    if (this.config) {
      closeDatabase(this.config.storage.dbPath);
    }
    this.started = false;
  }

  handleReference(
    text: string,
    target: string,
    callerId: string | number,
    options?: HandleReferenceOptions
  ): AsyncGenerator<RelayEvent, BatchResult, void> {
    return this.ensureStarted().handleReference(text, target, callerId, options);
  }

  getStatistics(windowMs?: number): Statistics {
    return this.ensureStarted().getStatistics(windowMs);
  }

  join(inviteOrName: string): Promise<Result<ResolvedConversation, ParseError | ResolveError>> {
    return this.ensureStarted().join(inviteOrName);
  }

  setPacingInterval(callerId: string | number, intervalMs: number | null): CallerProfile {
    return this.ensureStarted().setPacingInterval(callerId, intervalMs);
  }

  private ensureStarted(): RelayService {
    if (!this.started || !this.service) {
      throw new Error('Courier not started. Call start() first.');
    }
    return this.service;
  }
}

/**
 * Conversation Resolver
 *
 * Maps a conversation reference to a canonical handle, with a TTL cache shared
 * by every batch and a fallback scan of joined conversations for peers the
 * provider session has not seen yet.
 */

import type { ResolveError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import { callProvider } from '../provider/call.js';
import type { ConversationHandle, RelayProvider } from '../provider/types.js';
import { conversationRefKey, describeConversationRef } from './reference.js';
import type { ConversationRef, ResolvedConversation } from './types.js';

export const DEFAULT_RESOLVER_TTL_MS = 60 * 60 * 1000;
const DEFAULT_SCAN_LIMIT = 200;

export interface ResolverOptions {
  ttlMs?: number;
  scanLimit?: number;
  callTimeoutMs?: number;
  now?: () => number;
}

type ResolveResult = Result<ResolvedConversation, ResolveError>;

export class ResolverCache {
  private entries = new Map<string, ResolvedConversation>();

  constructor(private readonly ttlMs: number) {}

  get(key: string, now: number): ResolvedConversation | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (now - entry.resolvedAt >= this.ttlMs) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  set(key: string, entry: ResolvedConversation): void {
    this.entries.set(key, entry);
  }

  /** Drop every entry for a conversation, whichever ref it was cached under. */
  deleteConversation(conversationId: number): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (entry.canonicalId === conversationId) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  update(conversationId: number, fn: (entry: ResolvedConversation) => ResolvedConversation): void {
    for (const [key, entry] of this.entries) {
      if (entry.canonicalId === conversationId) {
        this.entries.set(key, fn(entry));
      }
    }
  }

  get size(): number {
    return this.entries.size;
  }
}

function matchesRef(handle: ConversationHandle, ref: ConversationRef): boolean {
  if (ref.kind === 'id') {
    return handle.id === ref.id;
  }
  return (handle.username ?? '').toLowerCase() === ref.username.toLowerCase();
}

export class ConversationResolver {
  private readonly cache: ResolverCache;
  private readonly inflight = new Map<string, Promise<ResolveResult>>();
  private readonly scanLimit: number;
  private readonly callTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly provider: RelayProvider,
    private readonly logger: Logger,
    options: ResolverOptions = {}
  ) {
    this.cache = new ResolverCache(options.ttlMs ?? DEFAULT_RESOLVER_TTL_MS);
    this.scanLimit = options.scanLimit ?? DEFAULT_SCAN_LIMIT;
    this.callTimeoutMs = options.callTimeoutMs ?? 30_000;
    this.now = options.now ?? Date.now;
  }

  async resolve(ref: ConversationRef): Promise<ResolveResult> {
    const key = conversationRefKey(ref);
    const cached = this.cache.get(key, this.now());
    if (cached) {
      return ok(cached);
    }

    // Concurrent batches asking for the same ref share one lookup.
    const pending = this.inflight.get(key);
    if (pending) {
      return pending;
    }

    const lookup = this.lookup(ref, key).finally(() => {
      this.inflight.delete(key);
    });
    this.inflight.set(key, lookup);
    return lookup;
  }

  /**
   * Seed the cache with a handle obtained outside `resolve`, e.g. after an
   * explicit join.
   */
  remember(handle: ConversationHandle, ref?: ConversationRef): ResolvedConversation {
    const resolved = this.toResolved(ref ?? { kind: 'id', id: handle.id }, handle);
    this.store(resolved);
    return resolved;
  }

  invalidate(conversationId: number): void {
    const removed = this.cache.deleteConversation(conversationId);
    if (removed > 0) {
      this.logger.debug('Invalidated resolver cache entries', { conversationId, removed });
    }
  }

  markRestricted(conversationId: number): void {
    this.cache.update(conversationId, (entry) =>
      entry.isRestricted ? entry : { ...entry, isRestricted: true }
    );
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async lookup(ref: ConversationRef, key: string): Promise<ResolveResult> {
    const label = describeConversationRef(ref);
    const direct = await callProvider('resolveConversation', this.callTimeoutMs, () =>
      this.provider.resolveConversation(ref)
    );

    if (direct.ok) {
      return ok(this.store(this.toResolved(ref, direct.value), key));
    }

    const failure = direct.error;
    switch (failure.kind) {
      case 'unknown_peer': {
        const scanned = await this.scanJoined(ref);
        if (!scanned.ok) {
          return scanned;
        }
        if (scanned.value) {
          this.logger.debug('Resolved conversation from joined list', { ref: label });
          return ok(this.store(this.toResolved(ref, scanned.value), key));
        }
        // A private id nobody in this session can see usually means "join first".
        if (ref.kind === 'id') {
          return err({ kind: 'NeedsMembership', ref, detail: `conversation ${label} is private or not joined` });
        }
        return err({ kind: 'ResolutionFailed', ref, detail: `cannot find conversation ${label}` });
      }
      case 'not_member':
      case 'restricted':
        return err({ kind: 'NeedsMembership', ref, detail: failure.detail });
      case 'throttled':
      case 'timeout':
        return err({ kind: 'Transient', ref, detail: failure.detail, retryAfterMs: failure.retryAfterMs ?? null });
      default:
        this.logger.warn('Conversation lookup failed', { ref: label, detail: failure.detail });
        return err({ kind: 'ResolutionFailed', ref, detail: failure.detail });
    }
  }

  private async scanJoined(
    ref: ConversationRef
  ): Promise<Result<ConversationHandle | null, ResolveError>> {
    if (this.scanLimit <= 0) {
      return ok(null);
    }
    const listed = await callProvider('listJoinedConversations', this.callTimeoutMs, () =>
      this.provider.listJoinedConversations(this.scanLimit)
    );
    if (!listed.ok) {
      const failure = listed.error;
      if (failure.kind === 'throttled' || failure.kind === 'timeout') {
        return err({ kind: 'Transient', ref, detail: failure.detail, retryAfterMs: failure.retryAfterMs ?? null });
      }
      return err({ kind: 'ResolutionFailed', ref, detail: failure.detail });
    }
    const candidates = listed.value.slice(0, this.scanLimit);
    return ok(candidates.find((handle) => matchesRef(handle, ref)) ?? null);
  }

  private toResolved(ref: ConversationRef, handle: ConversationHandle): ResolvedConversation {
    return {
      ref,
      handle,
      canonicalId: handle.id,
      displayName: handle.title || handle.username || String(handle.id),
      username: handle.username ?? null,
      resolvedAt: this.now(),
      isRestricted: handle.noForwards === true,
    };
  }

  private store(resolved: ResolvedConversation, key?: string): ResolvedConversation {
    this.cache.set(key ?? conversationRefKey(resolved.ref), resolved);
    // Also reachable by numeric id so later id-based refs hit the same entry.
    const idKey = conversationRefKey({ kind: 'id', id: resolved.canonicalId });
    this.cache.set(idKey, resolved);
    return resolved;
  }
}

/**
 * Data model for the relay engine.
 */

import type { ConversationHandle } from '../provider/types.js';

// ============================================================================
// References
// ============================================================================

export type ConversationRef =
  | { readonly kind: 'id'; readonly id: number }
  | { readonly kind: 'name'; readonly username: string };

export interface MessageRange {
  readonly conversation: ConversationRef;
  readonly startId: number;
  readonly endId: number;
  /** End id as written by the caller, before clamping to the range limit. */
  readonly requestedEndId: number;
  readonly truncated: boolean;
}

// ============================================================================
// Conversations
// ============================================================================

export interface ResolvedConversation {
  readonly ref: ConversationRef;
  readonly handle: ConversationHandle;
  readonly canonicalId: number;
  readonly displayName: string;
  readonly username: string | null;
  readonly resolvedAt: number;
  readonly isRestricted: boolean;
}

// ============================================================================
// Outcomes
// ============================================================================

export type RelayStatus =
  | 'success'
  | 'restricted'
  | 'not_found'
  | 'too_large'
  | 'transient_error'
  | 'fatal_error';

export const RELAY_STATUSES: readonly RelayStatus[] = [
  'success',
  'restricted',
  'not_found',
  'too_large',
  'transient_error',
  'fatal_error',
];

export type StrategyName = 'direct' | 'reemit' | 'republish' | 'archive';

/**
 * `forward` keeps attribution when the source allows it, `copy` never does,
 * `download` stores the media locally instead of publishing it.
 */
export type RelayMode = 'forward' | 'copy' | 'download';

export interface RelayOutcome {
  readonly conversationId: number;
  readonly messageId: number;
  readonly targetId: string;
  readonly status: RelayStatus;
  readonly reason: string;
  readonly strategy: StrategyName | null;
  readonly callerId: string | null;
  readonly timestamp: string;
  /** Provider-advised wait; only set on transient outcomes and never persisted. */
  readonly retryAfterMs?: number | null;
}

export interface BatchResult {
  total: number;
  successful: number;
  failed: number;
  restrictedCount: number;
}

// ============================================================================
// Callers
// ============================================================================

export type CallerTier = 'standard' | 'privileged';

export interface CallerProfile {
  readonly id: string;
  tier: CallerTier;
  lastOperationAt: number | null;
  requestCount: number;
  successCount: number;
  intervalOverrideMs: number | null;
}

export function emptyBatchResult(): BatchResult {
  return { total: 0, successful: 0, failed: 0, restrictedCount: 0 };
}

export function tallyOutcome(result: BatchResult, outcome: RelayOutcome): void {
  result.total += 1;
  if (outcome.status === 'success') {
    result.successful += 1;
    return;
  }
  result.failed += 1;
  if (outcome.status === 'restricted') {
    result.restrictedCount += 1;
  }
}

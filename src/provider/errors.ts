import type { RelayError, RelayErrorKind } from '../core/errors.js';
import { describeError } from '../core/errors.js';

export type ProviderErrorCode = Exclude<RelayErrorKind, 'too_large'>;

/**
 * Error a provider adapter can throw to state the failure kind explicitly.
 * Adapters that let the client library's own errors through are classified
 * from the error text instead.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: ProviderErrorCode,
    public readonly retryAfterMs: number | null = null
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

const FLOOD_WAIT_RE = /(?:FLOOD_WAIT_|FLOOD_PREMIUM_WAIT_|SLOWMODE_WAIT_)(\d+)/;
const WAIT_SECONDS_RE = /(?:wait of|retry after|retry_after[=:\s]+)\s*(\d+)\s*(?:seconds?)?/i;

const TEXT_PATTERNS: Array<{ kind: ProviderErrorCode; pattern: RegExp }> = [
  {
    kind: 'restricted',
    pattern: /CHAT_FORWARDS_RESTRICTED|protected content|can't forward|forwards? (?:are )?restricted/i,
  },
  { kind: 'not_found', pattern: /MESSAGE_ID_INVALID|MSG_ID_INVALID|message (?:was )?not found|MESSAGE_EMPTY/i },
  {
    kind: 'not_member',
    pattern: /CHANNEL_PRIVATE|CHAT_ADMIN_REQUIRED|USER_NOT_PARTICIPANT|INVITE_HASH_EXPIRED|not a member/i,
  },
  {
    kind: 'unknown_peer',
    pattern: /Could not find the input entity|PEER_ID_INVALID|CHANNEL_INVALID|CHAT_ID_INVALID|USERNAME_NOT_OCCUPIED|USERNAME_INVALID/i,
  },
  { kind: 'timeout', pattern: /timed? ?out|ETIMEDOUT|ECONNRESET/i },
];

export function parseFloodWaitMs(message: string): number | null {
  const flood = FLOOD_WAIT_RE.exec(message);
  if (flood) return Number(flood[1]) * 1000;
  const wait = WAIT_SECONDS_RE.exec(message);
  if (wait) return Number(wait[1]) * 1000;
  return null;
}

function readSeconds(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : null;
}

export function classifyProviderError(error: unknown): RelayError {
  if (error instanceof ProviderError) {
    return { kind: error.code, detail: error.message, retryAfterMs: error.retryAfterMs };
  }

  const detail = describeError(error);

  // Client libraries commonly attach the advised wait as `seconds`.
  if (error && typeof error === 'object' && 'seconds' in error) {
    const seconds = readSeconds(error.seconds);
    if (seconds !== null && FLOOD_WAIT_RE.test(detail)) {
      return { kind: 'throttled', detail, retryAfterMs: seconds * 1000 };
    }
  }

  const waitMs = parseFloodWaitMs(detail);
  if (waitMs !== null) {
    return { kind: 'throttled', detail, retryAfterMs: waitMs };
  }

  for (const { kind, pattern } of TEXT_PATTERNS) {
    if (pattern.test(detail)) {
      return { kind, detail, retryAfterMs: null };
    }
  }

  return { kind: 'fatal', detail, retryAfterMs: null };
}

import type { ConversationRef } from '../relay/types.js';

export type ParseError = {
  kind: 'InvalidFormat';
  input: string;
  detail: string;
};

export type ResolveErrorKind = 'NeedsMembership' | 'ResolutionFailed' | 'Transient';

export type ResolveError = {
  kind: ResolveErrorKind;
  ref: ConversationRef;
  detail: string;
  retryAfterMs?: number | null;
};

export type RelayErrorKind =
  | 'restricted'
  | 'not_found'
  | 'too_large'
  | 'throttled'
  | 'timeout'
  | 'unknown_peer'
  | 'not_member'
  | 'fatal';

/**
 * Classified provider failure. Strategies switch on `kind` instead of on
 * provider exception types.
 */
export type RelayError = {
  kind: RelayErrorKind;
  detail: string;
  retryAfterMs?: number | null;
};

export function isTransient(error: RelayError): boolean {
  return error.kind === 'throttled' || error.kind === 'timeout';
}

/** Failures meaning the cached conversation handle can no longer be trusted. */
export function isResolutionClass(error: RelayError): boolean {
  return error.kind === 'unknown_peer' || error.kind === 'not_member';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

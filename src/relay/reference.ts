import type { ParseError } from '../core/errors.js';
import { err, ok, type Result } from '../core/result.js';
import type { ConversationRef, MessageRange } from './types.js';

export const DEFAULT_MAX_RANGE_ITEMS = 50;

/** Provider convention: broadcast/supergroup ids are the short id prefixed with -100. */
export const SUPERGROUP_ID_PREFIX = '-100';

const LINK_PREFIX = String.raw`(?:(?:https?:\/\/)?(?:www\.)?(?:t\.me|telegram\.me|telegram\.dog)\/|prov:\/\/)`;
const MESSAGE_IDS = String.raw`(\d+)(?:-(\d+))?`;

const INTERNAL_LINK_RE = new RegExp(String.raw`^${LINK_PREFIX}c\/(-?\d+)\/${MESSAGE_IDS}\/?$`, 'i');
const PUBLIC_LINK_RE = new RegExp(String.raw`^${LINK_PREFIX}@?([A-Za-z0-9_]+)\/${MESSAGE_IDS}\/?$`, 'i');
const BARE_RE = new RegExp(String.raw`^(-?\d+)\/${MESSAGE_IDS}$`);
const INVITE_RE =
  /^(?:https?:\/\/)?(?:www\.)?(?:t\.me|telegram\.me|telegram\.dog)\/(?:\+|joinchat\/)([A-Za-z0-9_-]+)\/?$/i;

const PUBLIC_NAME_RE =
  /^(?:(?:https?:\/\/)?(?:www\.)?(?:t\.me|telegram\.me|telegram\.dog)\/|@)?([A-Za-z][A-Za-z0-9_]{3,31})\/?$/i;

const QUERY_OR_FRAGMENT_RE = /[?#].*$/;
// Brackets, quotes and sentence punctuation around a link in free text.
const LEADING_PUNCTUATION_RE = /^[([{<"'«“]+/;
const TRAILING_PUNCTUATION_RE = /[)\]}>"'»”.,;:!?]+$/;
const SEPARATOR_RE = /[\s,]+/;

export interface ParseOptions {
  maxRangeItems?: number;
}

export interface InviteLink {
  hash: string;
  link: string;
}

export interface ParsedReferences {
  ranges: MessageRange[];
  errors: ParseError[];
}

function invalid(input: string, detail: string): Result<never, ParseError> {
  return err({ kind: 'InvalidFormat', input, detail });
}

/**
 * Canonical numeric conversation id. Positive ids are taken to be the short
 * form of a supergroup/broadcast id and get the -100 prefix.
 */
export function canonicalConversationId(raw: string): number | null {
  if (!/^-?\d+$/.test(raw) || Number(raw) === 0) return null;
  const id = Number(raw.startsWith('-') ? raw : `${SUPERGROUP_ID_PREFIX}${raw}`);
  return Number.isSafeInteger(id) ? id : null;
}

export function conversationRefKey(ref: ConversationRef): string {
  return ref.kind === 'id' ? `id:${ref.id}` : `name:${ref.username.toLowerCase()}`;
}

export function describeConversationRef(ref: ConversationRef): string {
  return ref.kind === 'id' ? String(ref.id) : `@${ref.username}`;
}

function buildRange(
  input: string,
  conversation: ConversationRef,
  startRaw: string,
  endRaw: string | undefined,
  maxItems: number
): Result<MessageRange, ParseError> {
  const startId = Number(startRaw);
  const requestedEndId = endRaw === undefined ? startId : Number(endRaw);
  if (!Number.isSafeInteger(startId) || !Number.isSafeInteger(requestedEndId)) {
    return invalid(input, 'message id out of range');
  }
  if (startId < 1) {
    return invalid(input, 'message ids start at 1');
  }
  if (requestedEndId < startId) {
    return invalid(input, `range end ${requestedEndId} precedes start ${startId}`);
  }

  const span = requestedEndId - startId + 1;
  const truncated = span > maxItems;
  return ok({
    conversation,
    startId,
    endId: truncated ? startId + maxItems - 1 : requestedEndId,
    requestedEndId,
    truncated,
  });
}

/**
 * Parse one message reference: an internal link (`t.me/c/<id>/<msg>`), a public
 * link (`t.me/<name>/<msg>`) or the bare `<id>/<msg>` shorthand. Message ids may
 * be a dash range; ranges longer than `maxRangeItems` keep only the first ids
 * and come back flagged `truncated`.
 */
export function parseReference(text: string, options: ParseOptions = {}): Result<MessageRange, ParseError> {
  const input = text.trim();
  const maxItems = Math.max(1, options.maxRangeItems ?? DEFAULT_MAX_RANGE_ITEMS);
  if (!input) {
    return invalid(text, 'empty reference');
  }

  const token = input
    .replace(LEADING_PUNCTUATION_RE, '')
    .replace(TRAILING_PUNCTUATION_RE, '')
    .replace(QUERY_OR_FRAGMENT_RE, '');

  const internal = INTERNAL_LINK_RE.exec(token);
  if (internal) {
    const id = canonicalConversationId(internal[1] ?? '');
    if (id === null) return invalid(input, 'invalid conversation id');
    return buildRange(input, { kind: 'id', id }, internal[2] ?? '', internal[3], maxItems);
  }

  const bare = BARE_RE.exec(token);
  if (bare) {
    const id = canonicalConversationId(bare[1] ?? '');
    if (id === null) return invalid(input, 'invalid conversation id');
    return buildRange(input, { kind: 'id', id }, bare[2] ?? '', bare[3], maxItems);
  }

  const named = PUBLIC_LINK_RE.exec(token);
  if (named) {
    const username = named[1] ?? '';
    // `c` is the internal-link path segment, never a public name.
    if (username.toLowerCase() === 'c') {
      return invalid(input, 'internal link without a conversation id');
    }
    return buildRange(input, { kind: 'name', username }, named[2] ?? '', named[3], maxItems);
  }

  return invalid(input, 'unrecognised reference format');
}

/**
 * Parse every reference in free text separated by whitespace or commas.
 */
export function parseReferences(text: string, options: ParseOptions = {}): ParsedReferences {
  const out: ParsedReferences = { ranges: [], errors: [] };
  const tokens = text.split(SEPARATOR_RE).filter((token) => token.length > 0);
  if (tokens.length === 0) {
    out.errors.push({ kind: 'InvalidFormat', input: text, detail: 'empty reference' });
    return out;
  }
  for (const token of tokens) {
    const parsed = parseReference(token, options);
    if (parsed.ok) {
      out.ranges.push(parsed.value);
    } else {
      out.errors.push(parsed.error);
    }
  }
  return out;
}

export function parseInviteLink(text: string): Result<InviteLink, ParseError> {
  const input = text.trim();
  const match = INVITE_RE.exec(input.replace(QUERY_OR_FRAGMENT_RE, ''));
  if (!match?.[1]) {
    return invalid(input, 'not an invite link');
  }
  return ok({ hash: match[1], link: `https://t.me/+${match[1]}` });
}

/**
 * A public conversation name given as `@name`, `name` or `t.me/name`.
 */
export function parsePublicName(text: string): Result<string, ParseError> {
  const input = text.trim();
  const match = PUBLIC_NAME_RE.exec(input.replace(QUERY_OR_FRAGMENT_RE, ''));
  if (!match?.[1] || match[1].toLowerCase() === 'joinchat') {
    return invalid(input, 'not a public conversation name');
  }
  return ok(match[1]);
}

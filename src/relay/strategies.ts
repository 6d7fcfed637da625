/**
 * Ordered table of content-reproduction strategies. Each entry declares the
 * modes it serves and a static precondition; `run` returns null when the
 * strategy turns out not to apply to the fetched message.
 */

import { mkdir, rm } from 'node:fs/promises';

import type { RelayError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { err, ok, type Result } from '../core/result.js';
import { callProvider } from '../provider/call.js';
import type { MessageContent, RelayProvider } from '../provider/types.js';
import type { RelayMode, ResolvedConversation, StrategyName } from './types.js';

export interface StrategyLimits {
  callTimeoutMs: number;
  transferTimeoutMs: number;
  maxMediaBytes: number;
  tempPath: string;
  downloadsPath: string;
}

export interface StrategyContext {
  readonly conversation: ResolvedConversation;
  readonly messageId: number;
  readonly target: string;
  readonly mode: RelayMode;
  readonly provider: RelayProvider;
  readonly limits: StrategyLimits;
  readonly logger: Logger;
  /** Fetches the source message once per relay attempt. */
  loadMessage(): Promise<Result<MessageContent, RelayError>>;
}

export type StrategySuccess = { detail: string };
export type StrategyResult = Result<StrategySuccess, RelayError>;

export interface RelayStrategy {
  readonly name: StrategyName;
  readonly modes: readonly RelayMode[];
  applies(ctx: StrategyContext): boolean;
  run(ctx: StrategyContext): Promise<StrategyResult | null>;
}

function captionOf(message: MessageContent): string {
  return message.caption ?? message.text ?? '';
}

function checkSize(ctx: StrategyContext, message: MessageContent): RelayError | null {
  const size = message.media?.size;
  if (typeof size === 'number' && size > ctx.limits.maxMediaBytes) {
    return {
      kind: 'too_large',
      detail: `media is ${size} bytes, limit is ${ctx.limits.maxMediaBytes}`,
      retryAfterMs: null,
    };
  }
  return null;
}

async function removeLocalCopy(ctx: StrategyContext, path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error) {
    ctx.logger.warn('Failed to remove temporary media file', {
      path,
      detail: error instanceof Error ? error.message : String(error),
    });
  }
}

async function directRelay(ctx: StrategyContext): Promise<StrategyResult> {
  const relayed = await callProvider('relay', ctx.limits.callTimeoutMs, () =>
    ctx.provider.relay(ctx.conversation.handle, ctx.messageId, ctx.target)
  );
  return relayed.ok ? ok({ detail: 'relayed with attribution' }) : relayed;
}

async function reemit(ctx: StrategyContext): Promise<StrategyResult> {
  const loaded = await ctx.loadMessage();
  if (!loaded.ok) return loaded;
  const message = loaded.value;

  if (!message.media) {
    const text = message.text ?? message.caption ?? '';
    const sent = await callProvider('republish', ctx.limits.callTimeoutMs, () =>
      ctx.provider.republish(ctx.target, { type: 'text', text }, { attribution: false })
    );
    return sent.ok ? ok({ detail: 'republished text' }) : sent;
  }

  const media = message.media;
  const sent = await callProvider('republish', ctx.limits.callTimeoutMs, () =>
    ctx.provider.republish(
      ctx.target,
      { type: 'media', media, caption: captionOf(message) },
      { attribution: false }
    )
  );
  return sent.ok ? ok({ detail: `republished ${media.kind} by reference` }) : sent;
}

async function fetchThenRepublish(ctx: StrategyContext): Promise<StrategyResult | null> {
  const loaded = await ctx.loadMessage();
  if (!loaded.ok) return loaded;
  const message = loaded.value;
  const media = message.media;
  if (!media) return null;

  const tooLarge = checkSize(ctx, message);
  if (tooLarge) return err(tooLarge);

  await mkdir(ctx.limits.tempPath, { recursive: true });
  const downloaded = await callProvider(
    'downloadToLocal',
    ctx.limits.transferTimeoutMs,
    () => ctx.provider.downloadToLocal(media, ctx.limits.tempPath),
    {
      // A download that finishes after its timeout still leaves a temporary file.
      onLateResult: (late) => (late.ok ? removeLocalCopy(ctx, late.value) : undefined),
    }
  );
  if (!downloaded.ok) return downloaded;

  const localPath = downloaded.value;
  try {
    const published = await callProvider('publishLocal', ctx.limits.transferTimeoutMs, () =>
      ctx.provider.publishLocal(ctx.target, localPath, captionOf(message))
    );
    return published.ok ? ok({ detail: `republished ${media.kind} from local copy` }) : published;
  } finally {
    await removeLocalCopy(ctx, localPath);
  }
}

async function archiveLocally(ctx: StrategyContext): Promise<StrategyResult> {
  const loaded = await ctx.loadMessage();
  if (!loaded.ok) return loaded;
  const message = loaded.value;
  const media = message.media;
  if (!media) {
    return err({ kind: 'fatal', detail: 'message has no media to download', retryAfterMs: null });
  }

  const tooLarge = checkSize(ctx, message);
  if (tooLarge) return err(tooLarge);

  await mkdir(ctx.limits.downloadsPath, { recursive: true });
  const downloaded = await callProvider('downloadToLocal', ctx.limits.transferTimeoutMs, () =>
    ctx.provider.downloadToLocal(media, ctx.limits.downloadsPath)
  );
  return downloaded.ok ? ok({ detail: downloaded.value }) : downloaded;
}

export const STRATEGY_TABLE: readonly RelayStrategy[] = [
  {
    name: 'direct',
    modes: ['forward'],
    // A restricted source refuses relays; skip rather than spend a provider call on it.
    applies: (ctx) => !ctx.conversation.isRestricted,
    run: directRelay,
  },
  {
    name: 'reemit',
    modes: ['forward', 'copy'],
    applies: () => true,
    run: reemit,
  },
  {
    name: 'republish',
    modes: ['forward', 'copy'],
    applies: () => true,
    run: fetchThenRepublish,
  },
  {
    name: 'archive',
    modes: ['download'],
    applies: () => true,
    run: archiveLocally,
  },
];

export function applicableStrategies(
  ctx: StrategyContext,
  table: readonly RelayStrategy[] = STRATEGY_TABLE
): RelayStrategy[] {
  return table.filter((strategy) => strategy.modes.includes(ctx.mode) && strategy.applies(ctx));
}

import { existsSync, mkdtempSync, readdirSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import { createSilentLogger } from '../../src/core/logger.js';
import type { ConversationHandle, MediaDescriptor, MessageContent } from '../../src/provider/types.js';
import { RelayStrategyEngine } from '../../src/relay/engine.js';
import type { ResolvedConversation } from '../../src/relay/types.js';
import { START_TIME } from '../helpers/clock.js';
import { FakeProvider } from '../helpers/fake-provider.js';

class SlowDownloadProvider extends FakeProvider {
  constructor(private readonly delayMs: number) {
    super();
  }

  async downloadToLocal(media: MediaDescriptor, directory: string): Promise<string> {
    await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    return super.downloadToLocal(media, directory);
  }
}

const photo = (id: string, size = 1000) => ({ id, kind: 'photo' as const, fileName: `${id}.jpg`, size });

function setup(
  handle: ConversationHandle,
  messages: MessageContent[],
  maxMediaBytes = 10_000,
  provider: FakeProvider = new FakeProvider(),
  transferTimeoutMs = 1000
) {
  provider.addConversation({ handle, messages: new Map(messages.map((message): [number, MessageContent] => [message.id, message])) });
  const root = mkdtempSync(join(tmpdir(), 'courier-engine-'));
  const signals = { invalidate: vi.fn(), markRestricted: vi.fn() };
  const engine = new RelayStrategyEngine(provider, signals, createSilentLogger(), {
    callTimeoutMs: 1000,
    transferTimeoutMs,
    maxMediaBytes,
    tempPath: join(root, 'tmp'),
    downloadsPath: join(root, 'downloads'),
    now: () => START_TIME,
  });
  const conversation: ResolvedConversation = {
    ref: { kind: 'id', id: handle.id },
    handle,
    canonicalId: handle.id,
    displayName: handle.title,
    username: handle.username ?? null,
    resolvedAt: START_TIME,
    isRestricted: handle.noForwards === true,
  };
  return { provider, signals, engine, conversation, root };
}

describe('RelayStrategyEngine', () => {
  it('relays directly when the source allows it', async () => {
    const { provider, engine, conversation } = setup({ id: -1001, title: 'Open' }, [{ id: 5, text: 'hello' }]);

    const outcome = await engine.relay(conversation, 5, 'archive', { callerId: 'caller-1' });

    expect(outcome).toEqual({
      conversationId: -1001,
      messageId: 5,
      targetId: 'archive',
      status: 'success',
      reason: 'relayed with attribution',
      strategy: 'direct',
      callerId: 'caller-1',
      timestamp: '2026-03-01T12:00:00.000Z',
    });
    expect(provider.relayCalls).toEqual([{ conversationId: -1001, messageId: 5, target: 'archive' }]);
  });

  it('never relays from a restricted conversation and re-emits text instead', async () => {
    const { provider, engine, conversation } = setup(
      { id: -1002, title: 'Locked', noForwards: true },
      [{ id: 3, text: 'secret memo' }]
    );

    const outcome = await engine.relay(conversation, 3, 'archive');

    expect(outcome.status).toBe('success');
    expect(outcome.strategy).toBe('reemit');
    expect(outcome.reason).toBe('republished text');
    expect(provider.relayCalls).toHaveLength(0);
    expect(provider.republished).toEqual([
      { target: 'archive', content: { type: 'text', text: 'secret memo' }, options: { attribution: false } },
    ]);
  });

  it('marks the conversation restricted when a direct relay is refused', async () => {
    const handle = { id: -1003, title: 'Newly locked' };
    const { provider, signals, engine, conversation } = setup(handle, [{ id: 1, text: 'memo' }]);
    provider.failNext('relay', new Error('CHAT_FORWARDS_RESTRICTED'));

    const outcome = await engine.relay(conversation, 1, 'archive');

    expect(signals.markRestricted).toHaveBeenCalledWith(-1003);
    expect(outcome.strategy).toBe('reemit');
    expect(outcome.status).toBe('success');
  });

  it('falls back to download and republish for protected media and removes the copy', async () => {
    const { provider, engine, conversation } = setup(
      { id: -1002, title: 'Locked', noForwards: true },
      [{ id: 4, caption: 'chart', media: photo('m4') }]
    );
    provider.protectedMedia.add('m4');

    const outcome = await engine.relay(conversation, 4, 'archive');

    expect(outcome.status).toBe('success');
    expect(outcome.strategy).toBe('republish');
    expect(outcome.reason).toBe('republished photo from local copy');
    expect(provider.publishedLocal).toHaveLength(1);
    expect(provider.publishedLocal[0]?.caption).toBe('chart');
    expect(provider.publishedLocal[0]?.existed).toBe(true);
    expect(existsSync(provider.downloads[0]?.path ?? '')).toBe(false);
    expect(provider.fetchCalls).toHaveLength(1);
  });

  it('removes the local copy when publishing fails', async () => {
    const { provider, engine, conversation } = setup(
      { id: -1002, title: 'Locked', noForwards: true },
      [{ id: 4, media: photo('m4') }]
    );
    provider.protectedMedia.add('m4');
    provider.failNext('publishLocal', new Error('MEDIA_INVALID'));

    const outcome = await engine.relay(conversation, 4, 'archive');

    expect(outcome.status).toBe('fatal_error');
    expect(outcome.reason).toBe('MEDIA_INVALID');
    expect(outcome.strategy).toBe('republish');
    expect(provider.downloads).toHaveLength(1);
    expect(existsSync(provider.downloads[0]?.path ?? '')).toBe(false);
  });

  it('removes a temporary file from a download that finishes after its timeout', async () => {
    const slow = new SlowDownloadProvider(150);
    const { provider, engine, conversation, root } = setup(
      { id: -1002, title: 'Locked', noForwards: true },
      [{ id: 4, media: photo('m4') }],
      10_000,
      slow,
      50
    );
    provider.protectedMedia.add('m4');

    const outcome = await engine.relay(conversation, 4, 'archive');

    expect(outcome.status).toBe('transient_error');
    expect(outcome.strategy).toBe('republish');
    expect(outcome.reason).toBe('downloadToLocal timed out after 50ms');
    await vi.waitFor(() => {
      expect(provider.downloads).toHaveLength(1);
      expect(readdirSync(join(root, 'tmp'))).toEqual([]);
    });
    expect(provider.publishedLocal).toHaveLength(0);
  });

  it('rejects oversized media before downloading', async () => {
    const { provider, engine, conversation } = setup(
      { id: -1002, title: 'Locked', noForwards: true },
      [{ id: 8, media: photo('big', 50_000) }],
      10_000
    );
    provider.protectedMedia.add('big');

    const outcome = await engine.relay(conversation, 8, 'archive');

    expect(outcome.status).toBe('too_large');
    expect(outcome.reason).toBe('media is 50000 bytes, limit is 10000');
    expect(provider.downloads).toHaveLength(0);
  });

  it('reports restricted when every strategy is refused', async () => {
    const { provider, engine, conversation } = setup(
      { id: -1002, title: 'Locked', noForwards: true },
      [{ id: 4, media: photo('m4') }]
    );
    provider.protectedMedia.add('m4');
    provider.failNext('publishLocal', new Error("CHAT_FORWARDS_RESTRICTED: can't forward"));

    const outcome = await engine.relay(conversation, 4, 'archive');

    expect(outcome.status).toBe('restricted');
    expect(outcome.strategy).toBe('republish');
  });

  it('treats a missing message as terminal', async () => {
    const { engine, conversation } = setup({ id: -1001, title: 'Open' }, []);
    const outcome = await engine.relay(conversation, 9, 'archive');
    expect(outcome.status).toBe('not_found');
    expect(outcome.reason).toBe('message 9 not found');
    expect(outcome.strategy).toBe('direct');
  });

  it('aborts on throttling with the advised wait', async () => {
    const { provider, engine, conversation } = setup({ id: -1001, title: 'Open' }, [{ id: 5, text: 'hi' }]);
    provider.failNext('relay', new Error('FLOOD_WAIT_7'));

    const outcome = await engine.relay(conversation, 5, 'archive');

    expect(outcome.status).toBe('transient_error');
    expect(outcome.retryAfterMs).toBe(7000);
    expect(provider.republished).toHaveLength(0);
  });

  it('invalidates the resolver entry when access is lost', async () => {
    const { provider, signals, engine, conversation } = setup({ id: -1001, title: 'Open' }, [{ id: 5, text: 'hi' }]);
    provider.failNext('relay', new Error('CHANNEL_PRIVATE'));

    const outcome = await engine.relay(conversation, 5, 'archive');

    expect(signals.invalidate).toHaveBeenCalledWith(-1001);
    expect(outcome.status).toBe('fatal_error');
    expect(outcome.reason).toBe('conversation no longer accessible: CHANNEL_PRIVATE');
  });

  it('skips attribution in copy mode', async () => {
    const { provider, engine, conversation } = setup(
      { id: -1001, title: 'Open' },
      [{ id: 6, text: 'caption text', media: photo('m6') }]
    );

    const outcome = await engine.relay(conversation, 6, 'archive', { mode: 'copy' });

    expect(outcome.strategy).toBe('reemit');
    expect(outcome.reason).toBe('republished photo by reference');
    expect(provider.relayCalls).toHaveLength(0);
    expect(provider.republished[0]?.content).toEqual({ type: 'media', media: photo('m6'), caption: 'caption text' });
  });

  it('keeps the file in download mode', async () => {
    const { engine, conversation, root } = setup({ id: -1001, title: 'Open' }, [{ id: 7, media: photo('m7') }]);

    const outcome = await engine.relay(conversation, 7, 'archive', { mode: 'download' });

    const saved = join(root, 'downloads', 'm7.jpg');
    expect(outcome.status).toBe('success');
    expect(outcome.strategy).toBe('archive');
    expect(outcome.reason).toBe(saved);
    expect(readFileSync(saved, 'utf8')).toBe('payload:m7');
  });

  it('fails download mode for text-only messages', async () => {
    const { engine, conversation } = setup({ id: -1001, title: 'Open' }, [{ id: 2, text: 'just text' }]);
    const outcome = await engine.relay(conversation, 2, 'archive', { mode: 'download' });
    expect(outcome.status).toBe('fatal_error');
    expect(outcome.reason).toBe('message has no media to download');
  });

  it('fetches the message once across strategies', async () => {
    const { provider, engine, conversation } = setup({ id: -1001, title: 'Open' }, [{ id: 3 }]);

    const outcome = await engine.relay(conversation, 3, 'archive', { mode: 'copy' });

    expect(outcome.status).toBe('fatal_error');
    expect(outcome.reason).toBe('message 3 has no relayable content');
    expect(provider.fetchCalls).toHaveLength(1);
  });
});

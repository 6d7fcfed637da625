import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { ProviderError } from '../../src/provider/errors.js';
import type {
  ConversationHandle,
  MediaDescriptor,
  MessageContent,
  OutgoingContent,
  RelayProvider,
  RepublishOptions,
} from '../../src/provider/types.js';
import type { ConversationRef } from '../../src/relay/types.js';

export interface FakeConversation {
  handle: ConversationHandle;
  messages: Map<number, MessageContent>;
  /** Direct lookups fail with an unknown-peer error; only the joined list finds it. */
  unknownToSession?: boolean;
  /** Lookups fail with a private-channel error. */
  requiresMembership?: boolean;
  joined?: boolean;
}

type Operation = keyof RelayProvider;

export interface SentRecord {
  target: string;
  content: OutgoingContent;
  options: RepublishOptions;
}

/**
 * In-process provider that records every call and can be told to fail the
 * next N calls of an operation.
 */
export class FakeProvider implements RelayProvider {
  readonly conversations = new Map<number, FakeConversation>();
  readonly invites = new Map<string, number>();
  /** Media ids the provider refuses to send by reference. */
  readonly protectedMedia = new Set<string>();

  readonly resolveCalls: ConversationRef[] = [];
  readonly listCalls: number[] = [];
  readonly fetchCalls: Array<{ conversationId: number; messageId: number }> = [];
  readonly relayCalls: Array<{ conversationId: number; messageId: number; target: string }> = [];
  readonly republished: SentRecord[] = [];
  readonly downloads: Array<{ media: MediaDescriptor; directory: string; path: string }> = [];
  readonly publishedLocal: Array<{ target: string; path: string; caption: string; existed: boolean }> = [];
  readonly joinCalls: string[] = [];

  private failures = new Map<Operation, unknown[]>();

  addConversation(conversation: FakeConversation): FakeConversation {
    this.conversations.set(conversation.handle.id, conversation);
    return conversation;
  }

  failNext(operation: Operation, error: unknown, times = 1): void {
    const queue = this.failures.get(operation) ?? [];
    for (let i = 0; i < times; i += 1) {
      queue.push(error);
    }
    this.failures.set(operation, queue);
  }

  async resolveConversation(ref: ConversationRef): Promise<ConversationHandle> {
    this.resolveCalls.push(ref);
    this.maybeFail('resolveConversation');
    const found = this.find(ref);
    if (!found) {
      throw new Error(
        ref.kind === 'id' ? `Could not find the input entity for ${ref.id}` : 'USERNAME_NOT_OCCUPIED'
      );
    }
    if (found.requiresMembership && !found.joined) {
      throw new Error('CHANNEL_PRIVATE: The channel specified is private');
    }
    if (found.unknownToSession) {
      throw new Error(`Could not find the input entity for ${found.handle.id}`);
    }
    return found.handle;
  }

  async listJoinedConversations(limit: number): Promise<ConversationHandle[]> {
    this.listCalls.push(limit);
    this.maybeFail('listJoinedConversations');
    return Array.from(this.conversations.values())
      .filter((conversation) => conversation.joined)
      .map((conversation) => conversation.handle)
      .slice(0, limit);
  }

  async fetchMessage(conversation: ConversationHandle, messageId: number): Promise<MessageContent | null> {
    this.fetchCalls.push({ conversationId: conversation.id, messageId });
    this.maybeFail('fetchMessage');
    return this.conversations.get(conversation.id)?.messages.get(messageId) ?? null;
  }

  async relay(conversation: ConversationHandle, messageId: number, target: string): Promise<void> {
    this.relayCalls.push({ conversationId: conversation.id, messageId, target });
    this.maybeFail('relay');
    const source = this.conversations.get(conversation.id);
    if (source?.handle.noForwards) {
      throw new ProviderError('CHAT_FORWARDS_RESTRICTED', 'restricted');
    }
    if (!source?.messages.has(messageId)) {
      throw new ProviderError(`message ${messageId} not found`, 'not_found');
    }
  }

  async republish(target: string, content: OutgoingContent, options: RepublishOptions): Promise<void> {
    this.maybeFail('republish');
    if (content.type === 'media' && this.protectedMedia.has(content.media.id)) {
      throw new Error("CHAT_FORWARDS_RESTRICTED: You can't forward messages from a protected chat");
    }
    this.republished.push({ target, content, options });
  }

  async downloadToLocal(media: MediaDescriptor, directory: string): Promise<string> {
    this.maybeFail('downloadToLocal');
    const path = join(directory, media.fileName ?? `${media.id}.bin`);
    await writeFile(path, `payload:${media.id}`);
    this.downloads.push({ media, directory, path });
    return path;
  }

  async publishLocal(target: string, localPath: string, caption: string): Promise<void> {
    const existed = existsSync(localPath);
    this.publishedLocal.push({ target, path: localPath, caption, existed });
    this.maybeFail('publishLocal');
  }

  async join(inviteOrRef: string): Promise<ConversationHandle> {
    this.joinCalls.push(inviteOrRef);
    this.maybeFail('join');
    const byInvite = this.invites.get(inviteOrRef);
    const conversation =
      byInvite !== undefined
        ? this.conversations.get(byInvite)
        : this.find({ kind: 'name', username: inviteOrRef });
    if (!conversation) {
      throw new Error('INVITE_HASH_EXPIRED');
    }
    conversation.joined = true;
    return conversation.handle;
  }

  private find(ref: ConversationRef): FakeConversation | undefined {
    if (ref.kind === 'id') {
      return this.conversations.get(ref.id);
    }
    const wanted = ref.username.toLowerCase();
    return Array.from(this.conversations.values()).find(
      (conversation) => (conversation.handle.username ?? '').toLowerCase() === wanted
    );
  }

  private maybeFail(operation: Operation): void {
    const queue = this.failures.get(operation);
    if (queue && queue.length > 0) {
      throw queue.shift();
    }
  }
}

export function textMessages(ids: number[], prefix = 'post'): Map<number, MessageContent> {
  return new Map(ids.map((id): [number, MessageContent] => [id, { id, text: `${prefix} ${id}` }]));
}

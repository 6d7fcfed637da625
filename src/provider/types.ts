import type { ConversationRef } from '../relay/types.js';

/**
 * Everything the engine needs from a connected messaging provider client.
 * Session setup and transport are the host's concern.
 */

export interface ConversationHandle {
  id: number;
  title: string;
  username?: string | null;
  /** Set when the owner disabled forwarding/saving of content. */
  noForwards?: boolean;
}

export type MediaKind =
  | 'photo'
  | 'video'
  | 'document'
  | 'audio'
  | 'voice'
  | 'animation'
  | 'sticker'
  | 'other';

export interface MediaDescriptor {
  id: string;
  kind: MediaKind;
  fileName?: string | null;
  mimeType?: string | null;
  size?: number | null;
}

export interface MessageContent {
  id: number;
  text?: string | null;
  caption?: string | null;
  media?: MediaDescriptor | null;
}

export type OutgoingContent =
  | { type: 'text'; text: string }
  | { type: 'media'; media: MediaDescriptor; caption: string };

export interface RepublishOptions {
  attribution: false;
}

export interface RelayProvider {
  resolveConversation(ref: ConversationRef): Promise<ConversationHandle>;
  listJoinedConversations(limit: number): Promise<ConversationHandle[]>;
  /** Resolves to null when the message id does not exist. */
  fetchMessage(conversation: ConversationHandle, messageId: number): Promise<MessageContent | null>;
  relay(conversation: ConversationHandle, messageId: number, target: string): Promise<void>;
  republish(target: string, content: OutgoingContent, options: RepublishOptions): Promise<void>;
  downloadToLocal(media: MediaDescriptor, directory: string): Promise<string>;
  publishLocal(target: string, localPath: string, caption: string): Promise<void>;
  join(inviteOrRef: string): Promise<ConversationHandle>;
}

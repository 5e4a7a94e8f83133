/**
 * DealRelay — Message Types
 *
 * Platform messages are converted to this canonical shape by the source
 * listeners before anything else looks at them.
 */

export type MediaKind =
  | 'photo'
  | 'video'
  | 'animation'
  | 'document'
  | 'audio'
  | 'voice';

/**
 * Opaque handle to a media item attached to a source message.
 * Only the platform client that produced it knows how to forward it.
 */
export interface MediaRef {
  kind: MediaKind;
  fileId: string;
  /** Caption-free forward needs the original location as well */
  sourceChatId: string;
  sourceMessageId: number;
}

export interface CanonicalMessage {
  /** Configured source identity (e.g. `@channel` or `-100…`) */
  readonly sourceChatId: string;
  /** Monotonic per source */
  readonly messageId: number;
  /** ISO 8601 */
  readonly timestamp: string;
  /** Message text or media caption; empty string when absent */
  readonly text: string;
  readonly mediaRefs: readonly MediaRef[];
  /** Untouched platform payload */
  readonly raw: unknown;
  readonly sourceTitle?: string;
}

export interface MessageIdentity {
  sourceChatId: string;
  messageId: number;
}

export function identityOf(message: MessageIdentity): MessageIdentity {
  return { sourceChatId: message.sourceChatId, messageId: message.messageId };
}

export function identityKey(identity: MessageIdentity): string {
  return `${identity.sourceChatId}:${identity.messageId}`;
}

/**
 * DealRelay — Platform Client Contract
 *
 * Everything the relay needs from the messaging platform. Session setup
 * and transport details stay behind this interface.
 */

import type { MediaKind, MediaRef } from '../types';

export interface PlatformMedia {
  kind: MediaKind;
  fileId: string;
}

export interface PlatformMessage {
  /** Platform chat id as reported by the platform */
  chatId: string;
  chatUsername?: string;
  chatTitle?: string;
  messageId: number;
  /** Unix seconds */
  date: number;
  /** Text or caption; empty when absent */
  text: string;
  media: PlatformMedia[];
  raw: unknown;
}

export interface FeedOptions {
  signal?: AbortSignal;
}

export interface SentMessage {
  messageId: string;
}

export interface PlatformClient {
  /**
   * Live feed of new messages in one chat. The iterator throws a
   * ListenerError when the connection drops and ends when the signal aborts.
   */
  subscribe(chatId: string, options?: FeedOptions): AsyncIterable<PlatformMessage>;

  /**
   * Messages after `afterMessageId` (exclusive) that the platform still
   * retains, oldest first. Absent when the platform cannot replay history.
   */
  fetchHistory?(
    chatId: string,
    afterMessageId: number | null,
    options?: FeedOptions
  ): AsyncIterable<PlatformMessage>;

  getChatTitle(chatId: string): Promise<string | null>;

  /** Throws PublishError */
  sendText(chatId: string, text: string): Promise<SentMessage>;

  /** Throws PublishError */
  forwardMedia(chatId: string, media: MediaRef): Promise<SentMessage>;

  close(): Promise<void>;
}

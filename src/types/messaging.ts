/** Supported messaging platforms. */
export type Platform = 'telegram';

/** A normalized inbound message from a chat platform. */
export interface InboundMessage {
  platform: Platform;
  /** The sender's user ID as a string (platform-specific). */
  senderId: string;
  /** The destination chat ID used for reply routing. */
  chatId: string | number;
  text?: string;
  /** Original platform payload, kept for platform-specific extensions. */
  rawPayload: unknown;
}

/** What the dispatcher needs from a platform adapter. */
export interface MessageChannel {
  /** Set by the dispatcher; invoked for every inbound message. */
  onMessage?: (message: InboundMessage) => Promise<void>;
  sendText(chatId: string | number, text: string): Promise<void>;
  /** Show a "typing…" indicator while a turn runs, where the platform has one. */
  sendTyping?(chatId: string | number): Promise<void>;
  stop(): void | Promise<void>;
}

import type { InboundMessage, MessageChannel } from '../types/messaging.js';
import type { ChatCommands } from './chat-commands.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import { withRetry, type RetryOptions } from '../utils/retry.js';

/** Telegram rejects messages longer than 4096 characters. */
export const MAX_MESSAGE_CHARS = 4000;

export interface DispatcherOptions {
  /** Sender ids allowed to chat; empty allows everyone. */
  allowFrom?: Array<string | number>;
  retry?: RetryOptions;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/** Telegram answers a bad chat id or malformed text with a 4xx that no retry will fix; 429 is worth waiting for. */
export function isRetryableDelivery(error: unknown): boolean {
  if (!isRecord(error) || !isRecord(error.response)) return true;
  const status = error.response.statusCode;
  if (typeof status !== 'number') return true;
  return status === 429 || status >= 500;
}

/** Split on line breaks where possible so no chunk exceeds `limit`. */
export function splitMessage(text: string, limit = MAX_MESSAGE_CHARS): string[] {
  if (text.length <= limit) return [text];

  const chunks: string[] = [];
  let rest = text;
  while (rest.length > limit) {
    const newline = rest.lastIndexOf('\n', limit);
    const cut = newline > 0 ? newline : limit;
    chunks.push(rest.slice(0, cut));
    rest = rest.slice(cut).replace(/^\n/, '');
  }
  if (rest.length > 0) chunks.push(rest);
  return chunks;
}

/**
 * Connects a chat platform adapter to the chat commands and orchestrator.
 * Responsibilities:
 *   1. Register as the message callback on the adapter.
 *   2. Drop messages from senders outside the allow list.
 *   3. Run one turn per sender at a time, in arrival order.
 *   4. Send the reply back with bounded retry.
 */
export class Dispatcher {
  readonly #channel: MessageChannel;
  readonly #commands: ChatCommands;
  readonly #allowFrom: Set<string>;
  readonly #retry: RetryOptions;
  readonly #sessionQueues: Map<string, Promise<void>> = new Map();

  constructor(channel: MessageChannel, commands: ChatCommands, options: DispatcherOptions = {}) {
    this.#channel = channel;
    this.#commands = commands;
    this.#allowFrom = new Set((options.allowFrom ?? []).map((id) => String(id).trim()).filter(Boolean));
    this.#retry = { attempts: 3, label: 'telegram:sendText', shouldRetry: isRetryableDelivery, ...options.retry };

    this.#channel.onMessage = (message) => this.enqueue(message);
  }

  static sessionIdFor(message: InboundMessage): string {
    return `${message.platform}:${message.senderId}`;
  }

  /** Queue a message behind any turn already running for the same sender. */
  enqueue(message: InboundMessage): Promise<void> {
    const sessionId = Dispatcher.sessionIdFor(message);
    const previous = this.#sessionQueues.get(sessionId) ?? Promise.resolve();
    const next = previous.then(() => this.#handle(sessionId, message));
    this.#sessionQueues.set(sessionId, next);
    return next.finally(() => {
      if (this.#sessionQueues.get(sessionId) === next) {
        this.#sessionQueues.delete(sessionId);
      }
    });
  }

  isAllowed(senderId: string): boolean {
    return this.#allowFrom.size === 0 || this.#allowFrom.has(senderId);
  }

  // ── Core Dispatch Loop ────────────────────────────────────────────────────────

  async #handle(sessionId: string, message: InboundMessage): Promise<void> {
    try {
      const text = message.text?.trim();
      if (!text) return;

      if (!this.isAllowed(message.senderId)) {
        await logThought(`[Dispatcher] Ignoring message from unlisted sender ${message.senderId}.`);
        return;
      }

      if (!text.startsWith('/') && this.#channel.sendTyping) {
        await this.#channel.sendTyping(message.chatId).catch((err: unknown) => {
          console.warn('[Dispatcher] Typing indicator failed:', err instanceof Error ? err.message : String(err));
        });
      }

      const reply = await this.#commands.respond(sessionId, text);
      // /exit means nothing in a bot chat; the reply is still sent.
      if (reply.text.length > 0) {
        await this.#deliver(message.chatId, reply.text);
      }
    } catch (err) {
      const reason = scrubSensitiveText(err instanceof Error ? err.message : String(err));
      console.error('[Dispatcher] Unhandled error processing message:', reason);
      await logThought(`[Dispatcher] Unhandled error: ${reason}`);
    }
  }

  async #deliver(chatId: string | number, text: string): Promise<void> {
    for (const chunk of splitMessage(text)) {
      const result = await withRetry(() => this.#channel.sendText(chatId, chunk), this.#retry);
      if (!result.ok) {
        console.error(`[Dispatcher] Delivery to ${chatId} failed after ${result.attempts} attempts: ${result.error}`);
        return;
      }
    }
  }

  /** Tear down the adapter cleanly. */
  async shutdown(): Promise<void> {
    await this.#channel.stop();
  }
}

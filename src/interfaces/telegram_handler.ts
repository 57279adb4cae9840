import TelegramBot from 'node-telegram-bot-api';
import type { InboundMessage, MessageChannel } from '../types/messaging.js';

/** Minimum ms delay between processing successive messages (human-like pacing). */
const RATE_LIMIT_MS = 1000;

/**
 * Wraps the Telegram Bot API to provide:
 *   - Inbound text message normalization for the dispatcher
 *   - Human-like rate limiting between messages
 *   - Plain-text replies and a typing indicator
 */
export class TelegramHandler implements MessageChannel {
  readonly #bot: TelegramBot;
  #lastMessageAt: number = 0;

  /**
   * @param token - Telegram Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  constructor(token: string) {
    this.#bot = new TelegramBot(token, { polling: true });
    this.#registerListeners();
  }

  /** Callback invoked by the dispatcher for every normalized text message. */
  onMessage?: (message: InboundMessage) => Promise<void>;

  // ── Private Helpers ──────────────────────────────────────────────────────────

  async #applyRateLimit(): Promise<void> {
    const elapsed = Date.now() - this.#lastMessageAt;
    if (elapsed < RATE_LIMIT_MS) {
      await new Promise<void>((resolve) =>
        setTimeout(resolve, RATE_LIMIT_MS - elapsed),
      );
    }
    this.#lastMessageAt = Date.now();
  }

  #registerListeners(): void {
    this.#bot.on('message', async (msg) => {
      if (!msg.from || !msg.text) return;

      await this.#applyRateLimit();

      try {
        await this.onMessage?.({
          platform: 'telegram',
          senderId: String(msg.from.id),
          chatId: msg.chat.id,
          text: msg.text,
          rawPayload: msg,
        });
      } catch (err) {
        console.error('[TelegramHandler] Message handler failed:', err instanceof Error ? err.message : String(err));
      }
    });

    this.#bot.on('polling_error', (err) => {
      console.error('[TelegramHandler] Polling error:', err.message);
    });
  }

  // ── Public Send Methods ───────────────────────────────────────────────────────

  /** Send a plain-text reply to a chat. */
  async sendText(chatId: number | string, text: string): Promise<void> {
    await this.#bot.sendMessage(Number(chatId), text);
  }

  async sendTyping(chatId: number | string): Promise<void> {
    await this.#bot.sendChatAction(Number(chatId), 'typing');
  }

  /** Gracefully stop the polling loop. */
  async stop(): Promise<void> {
    await this.#bot.stopPolling();
  }
}

import TelegramBot from 'node-telegram-bot-api';
import { DeliveryMode, NotificationTransport, SubscriberId } from '../types';
import { RateLimiter, createTelegramLimiter } from '../utils/rate-limiter';
import { errorMessage } from '../utils/errors';
import { toPlainText } from './format';

export type MessageSender = Pick<TelegramBot, 'sendMessage'>;

/**
 * Delivers one message to one Telegram chat. The subscriber id is the chat id.
 * When Telegram rejects the HTML entities the message is sent once more as
 * plain text; any other failure propagates to the caller.
 */
export class TelegramNotifier implements NotificationTransport {
  private bot: MessageSender;
  private limiter: RateLimiter;

  constructor(bot: MessageSender, limiter: RateLimiter = createTelegramLimiter()) {
    this.bot = bot;
    this.limiter = limiter;
  }

  async send(subscriberId: SubscriberId, text: string, mode: DeliveryMode): Promise<void> {
    await this.limiter.acquire();

    if (mode === 'plain') {
      await this.bot.sendMessage(subscriberId, toPlainText(text), { disable_web_page_preview: true });
      return;
    }

    try {
      await this.bot.sendMessage(subscriberId, text, {
        parse_mode: 'HTML',
        disable_web_page_preview: true
      });
    } catch (error) {
      if (!isEntityParseError(error)) {
        throw error;
      }
      console.warn(`[Telegram] HTML rejected for chat ${subscriberId}, sending as plain text: ${errorMessage(error)}`);
      await this.limiter.acquire();
      await this.bot.sendMessage(subscriberId, toPlainText(text), { disable_web_page_preview: true });
    }
  }
}

export function isEntityParseError(error: unknown): boolean {
  return errorMessage(error).toLowerCase().includes("can't parse entities");
}

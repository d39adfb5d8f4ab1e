/**
 * Feedcast — Telegram Delivery
 *
 * Sends rendered digests through the Telegram Bot API.
 * Subscriber ids are Telegram chat ids.
 */

import { z } from 'zod';
import { DeliveryError } from '../lib/errors';
import { logger, errorMessage } from '../lib/logger';

const log = logger.child({ component: 'telegram' });

// ============================================================
// TYPES
// ============================================================

export interface MessageTransport {
  readonly name: string;
  /**
   * Resolves when delivered; rejects with DeliveryError otherwise.
   * Must stop when `signal` aborts; the dispatcher starts the next send at the deadline.
   */
  send(subscriberId: string, message: string, signal: AbortSignal): Promise<void>;
}

export interface TelegramConfig {
  botToken: string;
  apiBaseUrl?: string;
}

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const DEFAULT_API_BASE_URL = 'https://api.telegram.org';

// ============================================================
// TRANSPORTS
// ============================================================

export class TelegramTransport implements MessageTransport {
  readonly name = 'telegram';
  private readonly endpoint: string;

  constructor(config: TelegramConfig) {
    const base = config.apiBaseUrl ?? DEFAULT_API_BASE_URL;
    this.endpoint = `${base}/bot${config.botToken}/sendMessage`;
  }

  async send(subscriberId: string, message: string, signal: AbortSignal): Promise<void> {
    let res: Response;
    try {
      res = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: subscriberId,
          text: message,
          parse_mode: 'Markdown',
          disable_web_page_preview: true,
        }),
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new DeliveryError(subscriberId, 'Delivery aborted');
      }
      throw new DeliveryError(subscriberId, `Telegram request failed: ${errorMessage(error)}`);
    }

    const body: unknown = await res.json().catch(() => null);
    const parsed = TelegramResponseSchema.safeParse(body);

    if (!res.ok || !parsed.success || !parsed.data.ok) {
      const description = parsed.success ? parsed.data.description : undefined;
      throw new DeliveryError(
        subscriberId,
        `Telegram API error: ${res.status}${description ? ` - ${description}` : ''}`,
        res.status
      );
    }
  }
}

/**
 * Prints messages instead of sending them. Used when no bot token is
 * configured and for dry runs.
 */
export class ConsoleTransport implements MessageTransport {
  readonly name = 'console';

  async send(subscriberId: string, message: string): Promise<void> {
    console.log('='.repeat(60));
    console.log(`DIGEST for ${subscriberId} (Console Fallback)`);
    console.log('='.repeat(60));
    console.log(message);
    console.log('='.repeat(60));
  }
}

export function createTransport(botToken: string | undefined): MessageTransport {
  if (botToken) {
    return new TelegramTransport({ botToken });
  }

  log.warn('TELEGRAM_BOT_TOKEN not set, digests will be printed to the console');
  return new ConsoleTransport();
}

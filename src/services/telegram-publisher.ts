import TelegramBot from 'node-telegram-bot-api';
import { PublishError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Destination for rendered job messages.
 * Rejects with PublishError; `retryable` tells the caller whether the
 * same message may succeed on a later attempt.
 */
export interface JobPublisher {
  publish(message: string): Promise<void>;
}

export type MessageSender = Pick<TelegramBot, 'sendMessage'>;

export interface TelegramPublisherConfig {
  botToken: string;
  channelId: string;
}

function readStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) return undefined;
  const response = error.response;
  if (typeof response === 'object' && response !== null && 'statusCode' in response) {
    return typeof response.statusCode === 'number' ? response.statusCode : undefined;
  }
  return undefined;
}

function readErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Telegram 429 and 5xx, and network failures (EFATAL), are transient.
 * Any other 4xx (bad request, chat not found, bot removed from channel) is not.
 */
export function isRetryableTelegramError(error: unknown): boolean {
  const status = readStatusCode(error);
  if (status !== undefined) {
    return status === 429 || status >= 500;
  }
  return readErrorCode(error) !== 'ETELEGRAM';
}

/**
 * Posts job messages to a single Telegram channel
 */
export class TelegramChannelPublisher implements JobPublisher {
  private readonly bot: MessageSender;

  constructor(
    private readonly config: TelegramPublisherConfig,
    bot?: MessageSender
  ) {
    this.bot = bot ?? new TelegramBot(config.botToken, { polling: false });
  }

  async publish(message: string): Promise<void> {
    try {
      await this.bot.sendMessage(this.config.channelId, message, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
    } catch (error) {
      const retryable = isRetryableTelegramError(error);
      const statusCode = readStatusCode(error);

      logger.debug('Telegram sendMessage failed', {
        channelId: this.config.channelId,
        statusCode,
        retryable,
      });

      throw new PublishError(`Telegram rejected message: ${errorMessage(error)}`, retryable, {
        channelId: this.config.channelId,
        statusCode,
        code: readErrorCode(error),
      });
    }
  }
}

import type TelegramBot from 'node-telegram-bot-api';
import { describe, it, expect } from 'vitest';
import {
  TelegramChannelPublisher,
  isRetryableTelegramError,
  type MessageSender,
} from '../src/services/telegram-publisher';
import { PublishError } from '../src/utils/errors';

interface SentMessage {
  chatId: TelegramBot.ChatId;
  text: string;
  options?: TelegramBot.SendMessageOptions;
}

function telegramError(code: string, statusCode?: number): Error {
  const error = new Error(`${code}: test failure`);
  return Object.assign(error, {
    code,
    ...(statusCode === undefined ? {} : { response: { statusCode } }),
  });
}

function fakeBot(failure?: Error): { bot: MessageSender; sent: SentMessage[] } {
  const sent: SentMessage[] = [];
  const bot: MessageSender = {
    async sendMessage(chatId, text, options) {
      if (failure) throw failure;
      sent.push({ chatId, text, options });
      return { message_id: sent.length, date: 1714564800, chat: { id: -100, type: 'channel' } };
    },
  };
  return { bot, sent };
}

const config = { botToken: 'test-token', channelId: '@test_channel' };

describe('TelegramChannelPublisher', () => {
  it('posts HTML without link previews', async () => {
    const { bot, sent } = fakeBot();
    await new TelegramChannelPublisher(config, bot).publish('<b>hello</b>');

    expect(sent).toEqual([
      {
        chatId: '@test_channel',
        text: '<b>hello</b>',
        options: { parse_mode: 'HTML', disable_web_page_preview: true },
      },
    ]);
  });

  it('reports rate limiting as retryable', async () => {
    const { bot } = fakeBot(telegramError('ETELEGRAM', 429));
    const error = await new TelegramChannelPublisher(config, bot).publish('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PublishError);
    if (!(error instanceof PublishError)) return;
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('Telegram rejected message: ETELEGRAM: test failure');
    expect(error.context).toEqual({ channelId: '@test_channel', statusCode: 429, code: 'ETELEGRAM' });
  });

  it('reports a bad request as permanent', async () => {
    const { bot } = fakeBot(telegramError('ETELEGRAM', 400));
    await expect(new TelegramChannelPublisher(config, bot).publish('x')).rejects.toMatchObject({
      name: 'PublishError',
      retryable: false,
    });
  });
});

describe('isRetryableTelegramError', () => {
  it('treats server errors and network failures as transient', () => {
    expect(isRetryableTelegramError(telegramError('ETELEGRAM', 502))).toBe(true);
    expect(isRetryableTelegramError(telegramError('EFATAL'))).toBe(true);
    expect(isRetryableTelegramError(new Error('socket hang up'))).toBe(true);
  });

  it('treats client errors as permanent', () => {
    expect(isRetryableTelegramError(telegramError('ETELEGRAM', 403))).toBe(false);
    expect(isRetryableTelegramError(telegramError('ETELEGRAM'))).toBe(false);
  });
});

import type TelegramBot from 'node-telegram-bot-api';

export const TELEGRAM_CLIENT = Symbol('TELEGRAM_CLIENT');

/** The slice of the Bot API client the presentation channel needs. */
export type TelegramMessenger = Pick<TelegramBot, 'sendMessage' | 'editMessageText'>;

/** Everything the bot uses, polling included. */
export type TelegramClient = TelegramMessenger &
  Pick<TelegramBot, 'on' | 'startPolling' | 'stopPolling' | 'isPolling' | 'getMe'>;

export const TELEGRAM_RETRY = {
  maxAttempts: 3,
  baseDelayMs: 500,
} as const;

import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { RetryPolicy } from '../common/retry-policy';
import type { MessageHandle, PresentationChannel } from '../quiz/presentation.channel';
import { PresentationError, describeError } from '../quiz/quiz.errors';
import type { ChannelKey } from '../quiz/session';
import { TELEGRAM_CLIENT, TELEGRAM_RETRY, type TelegramMessenger } from './telegram.constants';

// node-telegram-bot-api rejects with ETELEGRAM (API answered with an error),
// EFATAL (request never completed) or EPARSE (unreadable response).
const botApiErrorSchema = z.object({
  code: z.string(),
  response: z
    .object({
      statusCode: z.number().optional(),
      body: z.object({ description: z.string().optional() }).passthrough().optional(),
    })
    .passthrough()
    .optional(),
});

type BotApiError = z.infer<typeof botApiErrorSchema>;

function parseBotApiError(error: unknown): BotApiError | undefined {
  const parsed = botApiErrorSchema.safeParse(error);
  return parsed.success ? parsed.data : undefined;
}

function isRetryable(error: BotApiError | undefined): boolean {
  if (!error) return false;
  if (error.code === 'EFATAL') return true;
  const status = error.response?.statusCode;
  return error.code === 'ETELEGRAM' && status !== undefined && (status === 429 || status >= 500);
}

function isNotModified(error: unknown): boolean {
  const description = parseBotApiError(error)?.response?.body?.description ?? describeError(error);
  return description.includes('message is not modified');
}

/**
 * Sends and edits quiz messages through the Bot API. Rate limits, server
 * errors and network failures are retried; anything else, or a failure that
 * outlasts the retries, surfaces as {@link PresentationError}.
 */
@Injectable()
export class TelegramPresentationChannel implements PresentationChannel {
  private readonly logger = new Logger(TelegramPresentationChannel.name);
  private readonly retry = new RetryPolicy({
    ...TELEGRAM_RETRY,
    shouldRetry: (error) => error instanceof PresentationError && error.retryable,
    onRetry: (error, attempt, wait) =>
      this.logger.warn(`Telegram request failed (attempt ${attempt}): ${describeError(error)}, retrying in ${wait}ms`),
  });

  constructor(@Inject(TELEGRAM_CLIENT) private readonly bot: TelegramMessenger) {}

  async send(channelKey: ChannelKey, content: string): Promise<MessageHandle> {
    const message = await this.request('sendMessage', () => this.bot.sendMessage(channelKey, content));
    return { channelKey, messageId: message.message_id };
  }

  async edit(handle: MessageHandle, content: string): Promise<void> {
    await this.request('editMessageText', async () => {
      try {
        await this.bot.editMessageText(content, { chat_id: handle.channelKey, message_id: handle.messageId });
      } catch (error) {
        // Same text as before; the chat already shows what we wanted.
        if (isNotModified(error)) return;
        throw error;
      }
    });
  }

  private request<T>(method: string, call: () => Promise<T>): Promise<T> {
    return this.retry.execute(async () => {
      try {
        return await call();
      } catch (error) {
        throw new PresentationError(
          `Telegram ${method} failed: ${describeError(error)}`,
          isRetryable(parseBotApiError(error)),
          error,
        );
      }
    });
  }
}

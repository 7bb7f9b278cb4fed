import { PresentationError } from '../quiz/quiz.errors';
import { TelegramPresentationChannel } from './telegram-presentation.channel';

const botApiError = (statusCode: number, description: string) =>
  Object.assign(new Error(`ETELEGRAM: ${statusCode} ${description}`), {
    code: 'ETELEGRAM',
    response: { statusCode, body: { ok: false, error_code: statusCode, description } },
  });

describe('TelegramPresentationChannel', () => {
  let bot: { sendMessage: jest.Mock; editMessageText: jest.Mock };
  let channel: TelegramPresentationChannel;

  beforeEach(() => {
    jest.useFakeTimers();
    bot = { sendMessage: jest.fn(), editMessageText: jest.fn() };
    channel = new TelegramPresentationChannel(bot);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('returns a handle for the sent message', async () => {
    bot.sendMessage.mockResolvedValue({ message_id: 42 });

    await expect(channel.send('-100123', 'Hello')).resolves.toEqual({ channelKey: '-100123', messageId: 42 });
    expect(bot.sendMessage).toHaveBeenCalledWith('-100123', 'Hello');
  });

  it('edits by chat and message id', async () => {
    bot.editMessageText.mockResolvedValue(true);

    await channel.edit({ channelKey: '-100123', messageId: 42 }, 'Updated');

    expect(bot.editMessageText).toHaveBeenCalledWith('Updated', { chat_id: '-100123', message_id: 42 });
  });

  it('retries a rate-limited request with backoff', async () => {
    bot.sendMessage
      .mockRejectedValueOnce(botApiError(429, 'Too Many Requests: retry after 1'))
      .mockResolvedValueOnce({ message_id: 7 });

    const sent = channel.send('-100123', 'Hello');
    await jest.advanceTimersByTimeAsync(500);

    await expect(sent).resolves.toEqual({ channelKey: '-100123', messageId: 7 });
    expect(bot.sendMessage).toHaveBeenCalledTimes(2);
  });

  it('gives up after three attempts', async () => {
    bot.sendMessage.mockRejectedValue(botApiError(502, 'Bad Gateway'));

    const sent = channel.send('-100123', 'Hello').catch((error: unknown) => error);
    await jest.advanceTimersByTimeAsync(1500);
    const error = await sent;

    expect(error).toBeInstanceOf(PresentationError);
    expect(error).toMatchObject({ retryable: true, message: 'Telegram sendMessage failed: ETELEGRAM: 502 Bad Gateway' });
    expect(bot.sendMessage).toHaveBeenCalledTimes(3);
  });

  it('does not retry a bad request', async () => {
    bot.sendMessage.mockRejectedValue(botApiError(400, 'Bad Request: chat not found'));

    await expect(channel.send('-100123', 'Hello')).rejects.toMatchObject({ name: 'PresentationError', retryable: false });
    expect(bot.sendMessage).toHaveBeenCalledTimes(1);
  });

  it('retries network failures', async () => {
    bot.editMessageText
      .mockRejectedValueOnce(Object.assign(new Error('EFATAL: socket hang up'), { code: 'EFATAL' }))
      .mockResolvedValueOnce(true);

    const edited = channel.edit({ channelKey: '-100123', messageId: 42 }, 'Updated');
    await jest.advanceTimersByTimeAsync(500);

    await expect(edited).resolves.toBeUndefined();
    expect(bot.editMessageText).toHaveBeenCalledTimes(2);
  });

  it('treats an unchanged message as edited', async () => {
    bot.editMessageText.mockRejectedValue(
      botApiError(400, 'Bad Request: message is not modified: specified new message content is the same'),
    );

    await expect(channel.edit({ channelKey: '-100123', messageId: 42 }, 'Same')).resolves.toBeUndefined();
    expect(bot.editMessageText).toHaveBeenCalledTimes(1);
  });
});

import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import type TelegramBot from 'node-telegram-bot-api';

import type { Env } from '../config/configuration';
import { PRESENTATION_CHANNEL } from '../quiz/presentation.channel';
import { NoSuchQuestionSetError, SessionNotFoundError, fail, ok } from '../quiz/quiz.errors';
import { formatStatus } from '../quiz/quiz.messages';
import { QuizSessionService } from '../quiz/quiz-session.service';
import { QuizService } from '../quiz/quiz.service';
import type { SessionSnapshot } from '../quiz/session';
import { SettingsService } from '../quiz/settings.service';
import { TELEGRAM_CLIENT } from '../telegram/telegram.constants';
import { formatHelp } from './bot.messages';
import { BotService, parseCommand } from './bot.service';

const CHAT = '-100123';

const message = (text: string): TelegramBot.Message => ({
  message_id: 1,
  date: 0,
  chat: { id: Number(CHAT), type: 'group' },
  text,
});

const snapshot: SessionSnapshot = {
  channelKey: CHAT,
  questionSetName: 'trivia',
  cursor: 1,
  total: 3,
  active: true,
  paused: false,
  settings: { randomOrder: false, timerDurationSeconds: 30 },
  startedAt: new Date('2024-05-01T10:00:00Z'),
};

describe('parseCommand', () => {
  it('splits the command, its target bot and its arguments', () => {
    expect(parseCommand('/quiz@quiz_test_bot  space   facts')).toEqual({
      command: 'quiz',
      target: 'quiz_test_bot',
      args: ['space', 'facts'],
    });
    expect(parseCommand('/STATUS')).toEqual({ command: 'status', args: [] });
  });

  it('ignores plain text', () => {
    expect(parseCommand('hello /quiz')).toBeUndefined();
  });
});

describe('BotService', () => {
  let service: BotService;
  let settings: SettingsService;
  let sent: string[];
  let loadErrors: string[];
  let client: {
    on: jest.Mock;
    startPolling: jest.Mock;
    stopPolling: jest.Mock;
    isPolling: jest.Mock;
    getMe: jest.Mock;
  };
  let sessions: {
    startSession: jest.Mock;
    presentCurrentQuestion: jest.Mock;
    stopSession: jest.Mock;
    pauseSession: jest.Mock;
    resumeSession: jest.Mock;
    getProgress: jest.Mock;
    getSessionState: jest.Mock;
  };

  const send = (text: string) => service.handleMessage(message(text));

  beforeEach(async () => {
    sent = [];
    client = {
      on: jest.fn(),
      startPolling: jest.fn().mockResolvedValue(undefined),
      stopPolling: jest.fn().mockResolvedValue(undefined),
      isPolling: jest.fn(() => true),
      getMe: jest.fn().mockResolvedValue({ id: 1, is_bot: true, first_name: 'Quiz', username: 'quiz_test_bot' }),
    };
    sessions = {
      startSession: jest.fn(),
      presentCurrentQuestion: jest.fn().mockResolvedValue('completed'),
      stopSession: jest.fn(),
      pauseSession: jest.fn(),
      resumeSession: jest.fn(),
      getProgress: jest.fn(),
      getSessionState: jest.fn(() => 'inactive'),
    };
    loadErrors = [];
    const quizzes: Pick<QuizService, 'listNames' | 'getQuestionCount' | 'getLoadErrors' | 'isSampleActive'> = {
      listNames: () => ['space', 'trivia'],
      getQuestionCount: (name) => (name === 'trivia' ? 3 : 5),
      getLoadErrors: () => loadErrors,
      isSampleActive: () => false,
    };
    settings = new SettingsService(
      new ConfigService<Env, true>({ QUIZ_RANDOM_ORDER: false, QUIZ_TIMER_DURATION: 30 }),
    );

    const moduleRef = await Test.createTestingModule({
      providers: [
        BotService,
        { provide: TELEGRAM_CLIENT, useValue: client },
        {
          provide: PRESENTATION_CHANNEL,
          useValue: {
            send: jest.fn(async (channelKey: string, content: string) => {
              sent.push(content);
              return { channelKey, messageId: sent.length };
            }),
            edit: jest.fn(),
          },
        },
        { provide: QuizService, useValue: quizzes },
        { provide: SettingsService, useValue: settings },
        { provide: QuizSessionService, useValue: sessions },
      ],
    }).compile();

    moduleRef.useLogger(false);
    service = moduleRef.get(BotService);
  });

  it('starts polling once the bot knows its name', async () => {
    await service.onModuleInit();

    expect(client.getMe).toHaveBeenCalled();
    expect(client.on).toHaveBeenCalledWith('message', expect.any(Function));
    expect(client.startPolling).toHaveBeenCalled();

    await service.onModuleDestroy();
    expect(client.stopPolling).toHaveBeenCalled();
  });

  it('answers /help with the commands, settings and quizzes', async () => {
    await send('/help');

    expect(sent).toEqual([
      formatHelp(
        [
          { name: 'space', questionCount: 5 },
          { name: 'trivia', questionCount: 3 },
        ],
        { randomOrder: false, timerDurationSeconds: 30 },
      ),
    ]);
  });

  it('lists quizzes', async () => {
    await send('/quizzes');

    expect(sent).toEqual([
      '📚 Available quizzes:\n\n• space (5 questions)\n• trivia (3 questions)\n\nStart one with /quiz <name>.',
    ]);
  });

  it('mentions quiz files that failed to load', async () => {
    loadErrors = ['broken.json: Unexpected end of JSON input'];

    await send('/quizzes');

    expect(sent[0].endsWith('\n\n⚠️ Skipped 1 quiz file(s):\n• broken.json: Unexpected end of JSON input')).toBe(true);
  });

  it('starts a quiz and begins presenting it', async () => {
    sessions.startSession.mockReturnValue(ok({ ...snapshot, cursor: 0 }));

    await send('/quiz trivia');

    expect(sessions.startSession).toHaveBeenCalledWith(CHAT, 'trivia');
    expect(sent).toEqual(['🚀 Starting "trivia": 3 questions, 30s each.']);
    expect(sessions.presentCurrentQuestion).toHaveBeenCalledWith(CHAT);
  });

  it('explains an unknown quiz', async () => {
    sessions.startSession.mockReturnValue(fail(new NoSuchQuestionSetError('history', ['space', 'trivia'])));

    await send('/quiz history');

    expect(sent).toEqual(['❌ Quiz "history" not found. Available quizzes: space, trivia']);
    expect(sessions.presentCurrentQuestion).not.toHaveBeenCalled();
  });

  it('asks for a quiz name', async () => {
    await send('/quiz');

    expect(sessions.startSession).not.toHaveBeenCalled();
    expect(sent[0].startsWith('❓ Usage: /quiz <name>')).toBe(true);
  });

  it('only follows commands addressed to itself', async () => {
    await service.onModuleInit();
    sessions.startSession.mockReturnValue(ok(snapshot));

    await send('/quiz@other_bot trivia');
    expect(sessions.startSession).not.toHaveBeenCalled();

    await send('/quiz@Quiz_Test_Bot trivia');
    expect(sessions.startSession).toHaveBeenCalledWith(CHAT, 'trivia');
  });

  it('stops the running quiz', async () => {
    sessions.stopSession.mockResolvedValueOnce(ok(snapshot)).mockResolvedValueOnce(fail(new SessionNotFoundError(CHAT)));

    await send('/stop');
    await send('/stop');

    expect(sessions.stopSession).toHaveBeenCalledWith(CHAT);
    expect(sent).toEqual([
      '⏹️ Quiz "trivia" stopped at question 2/3.',
      'ℹ️ No active quiz in this chat. Start one with /quiz <name>.',
    ]);
  });

  it('pauses and resumes', async () => {
    sessions.pauseSession
      .mockReturnValueOnce(ok({ alreadyPaused: false, snapshot }))
      .mockReturnValueOnce(ok({ alreadyPaused: true, snapshot }));
    sessions.resumeSession.mockReturnValueOnce(ok({ notPaused: false, snapshot }));

    await send('/pause');
    await send('/pause');
    await send('/resume');

    expect(sent).toEqual([
      '⏸️ Quiz paused. Send /resume to continue.',
      'ℹ️ The quiz is already paused.',
      '▶️ Quiz resumed.',
    ]);
  });

  it('shows the status of the running quiz', async () => {
    jest.useFakeTimers().setSystemTime(new Date('2024-05-01T10:00:30Z'));
    sessions.getProgress.mockReturnValue(snapshot);
    sessions.getSessionState.mockReturnValue('active');

    await send('/status');
    jest.useRealTimers();

    expect(sent).toEqual([formatStatus(snapshot, 'active', new Date('2024-05-01T10:00:30Z'))]);
  });

  it('says when the last quiz has finished', async () => {
    sessions.getProgress.mockReturnValue(undefined);
    sessions.getSessionState.mockReturnValue('completed');

    await send('/status');

    expect(sent).toEqual(['🏁 The last quiz in this chat has finished. Start another with /quiz <name>.']);
  });

  it('changes settings through commands', async () => {
    await send('/set_timer 4');
    await send('/set_timer 45');
    await send('/set_questions 10');
    await send('/set_questions lots');
    await send('/random_order');
    await send('/settings');

    expect(sent).toEqual([
      '❌ Invalid settings: Timer duration must be a whole number between 5 and 300 seconds, got 4',
      '✅ Timer set to 45 seconds per question.',
      '✅ Questions per quiz set to 10.',
      '❌ "lots" is not a whole number.',
      '🔀 Random order is now on.',
      '⚙️ Quiz settings\n\n🔢 Questions per quiz: 10\n🔀 Random order: on\n⏱️ Timer: 45s per question',
    ]);
  });

  it('restores the default settings', async () => {
    await send('/set_timer 45');
    await send('/random_order');
    await send('/reset_settings');

    expect(sent[2]).toBe(
      '♻️ Settings restored to their defaults.\n\n⚙️ Quiz settings\n\n🔢 Questions per quiz: all\n🔀 Random order: off\n⏱️ Timer: 30s per question',
    );
    expect(settings.getQuizSettings()).toEqual({ randomOrder: false, timerDurationSeconds: 30 });
  });

  it('goes back to using every question', async () => {
    settings.setQuestionCount(10);

    await send('/set_questions all');

    expect(sent).toEqual(['✅ Quizzes will use all available questions.']);
    expect(settings.getQuizSettings().questionCount).toBeUndefined();
  });

  it('points unknown commands at /help and ignores plain text', async () => {
    await send('good morning');
    await send('/dance');

    expect(sent).toEqual(['❓ Unknown command /dance. Send /help for the list of commands.']);
  });
});

import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import type TelegramBot from 'node-telegram-bot-api';

import { PRESENTATION_CHANNEL, type PresentationChannel } from '../quiz/presentation.channel';
import { describeError, userMessageFor } from '../quiz/quiz.errors';
import { formatStatus } from '../quiz/quiz.messages';
import { QuizSessionService } from '../quiz/quiz-session.service';
import { QuizService } from '../quiz/quiz.service';
import type { ChannelKey } from '../quiz/session';
import { SettingsService } from '../quiz/settings.service';
import { TELEGRAM_CLIENT, type TelegramClient } from '../telegram/telegram.constants';
import {
  NO_SESSION_MESSAGE,
  formatHelp,
  formatLoadProblems,
  formatQuizList,
  formatSettings,
  formatStarted,
  formatStopped,
  type QuizListing,
} from './bot.messages';

interface ParsedCommand {
  command: string;
  args: string[];
  /** Bot named in `/cmd@name`, if any. */
  target?: string;
}

export function parseCommand(text: string): ParsedCommand | undefined {
  const match = /^\/([a-z_]+)(?:@(\w+))?(?:\s+(.*))?$/is.exec(text.trim());
  if (!match) return undefined;
  const [, command, target, rest] = match;
  return {
    command: command.toLowerCase(),
    args: rest ? rest.trim().split(/\s+/) : [],
    ...(target ? { target } : {}),
  };
}

/**
 * Maps chat commands onto the quiz core and replies in the chat. Only
 * commands are handled; any other message is ignored.
 */
@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BotService.name);
  private username?: string;

  constructor(
    @Inject(TELEGRAM_CLIENT) private readonly bot: TelegramClient,
    @Inject(PRESENTATION_CHANNEL) private readonly channel: PresentationChannel,
    private readonly quizzes: QuizService,
    private readonly settings: SettingsService,
    private readonly sessions: QuizSessionService,
  ) {}

  async onModuleInit(): Promise<void> {
    try {
      const me = await this.bot.getMe();
      this.username = me.username;
      this.logger.log(`Bot identified as @${me.username ?? me.first_name}`);
    } catch (error) {
      this.logger.error(`Could not identify the bot: ${describeError(error)}`);
    }

    this.bot.on('message', (msg) => {
      void this.handleMessage(msg);
    });
    this.bot.on('polling_error', (error) => {
      this.logger.error(`Polling error: ${error.message}`);
    });

    void this.bot.startPolling().then(
      () => this.logger.log('Bot polling started'),
      (error: unknown) => this.logger.error(`Failed to start polling: ${describeError(error)}`),
    );
  }

  async onModuleDestroy(): Promise<void> {
    if (this.bot.isPolling()) {
      await this.bot.stopPolling();
      this.logger.log('Bot polling stopped');
    }
  }

  async handleMessage(msg: TelegramBot.Message): Promise<void> {
    const text = msg.text?.trim();
    if (!text) return;

    const parsed = parseCommand(text);
    if (!parsed) return;
    if (parsed.target && this.username && parsed.target.toLowerCase() !== this.username.toLowerCase()) return;

    const key = String(msg.chat.id);
    this.logger.debug(`/${parsed.command} from chat ${key}`);

    try {
      await this.dispatch(key, parsed);
    } catch (error) {
      this.logger.error(`Command /${parsed.command} failed in chat ${key}: ${describeError(error)}`);
    }
  }

  private async dispatch(key: ChannelKey, { command, args }: ParsedCommand): Promise<void> {
    switch (command) {
      case 'start':
      case 'help':
        return this.reply(key, formatHelp(this.listQuizzes(), this.settings.getQuizSettings()));
      case 'quizzes': {
        const problems = formatLoadProblems(this.quizzes.getLoadErrors(), this.quizzes.isSampleActive());
        const list = formatQuizList(this.listQuizzes());
        return this.reply(key, problems ? `${list}\n\n${problems}` : list);
      }
      case 'quiz':
        return this.startQuiz(key, args[0]);
      case 'stop':
        return this.stopQuiz(key);
      case 'pause':
        return this.pauseQuiz(key);
      case 'resume':
        return this.resumeQuiz(key);
      case 'status':
        return this.showStatus(key);
      case 'settings':
        return this.reply(key, formatSettings(this.settings.getQuizSettings()));
      case 'set_questions':
        return this.setQuestionCount(key, args[0]);
      case 'random_order': {
        const { randomOrder } = this.settings.toggleRandomOrder();
        return this.reply(key, `🔀 Random order is now ${randomOrder ? 'on' : 'off'}.`);
      }
      case 'set_timer':
        return this.setTimer(key, args[0]);
      case 'reset_settings':
        return this.reply(key, `♻️ Settings restored to their defaults.\n\n${formatSettings(this.settings.reset())}`);
      default:
        return this.reply(key, `❓ Unknown command /${command}. Send /help for the list of commands.`);
    }
  }

  private async startQuiz(key: ChannelKey, name: string | undefined): Promise<void> {
    if (!name) {
      return this.reply(key, `❓ Usage: /quiz <name>\n\n${formatQuizList(this.listQuizzes())}`);
    }

    const result = this.sessions.startSession(key, name);
    if (!result.ok) {
      return this.reply(key, userMessageFor(result.error));
    }

    await this.reply(key, formatStarted(result.value));
    void this.sessions.presentCurrentQuestion(key).then(
      (outcome) => this.logger.log(`Quiz in chat ${key} ended: ${outcome}`),
      (error: unknown) => this.logger.error(`Quiz in chat ${key} crashed: ${describeError(error)}`),
    );
  }

  private async stopQuiz(key: ChannelKey): Promise<void> {
    const result = await this.sessions.stopSession(key);
    await this.reply(key, result.ok ? formatStopped(result.value) : NO_SESSION_MESSAGE);
  }

  private async pauseQuiz(key: ChannelKey): Promise<void> {
    const result = this.sessions.pauseSession(key);
    if (!result.ok) return this.reply(key, NO_SESSION_MESSAGE);
    await this.reply(
      key,
      result.value.alreadyPaused ? 'ℹ️ The quiz is already paused.' : '⏸️ Quiz paused. Send /resume to continue.',
    );
  }

  private async resumeQuiz(key: ChannelKey): Promise<void> {
    const result = this.sessions.resumeSession(key);
    if (!result.ok) return this.reply(key, NO_SESSION_MESSAGE);
    await this.reply(key, result.value.notPaused ? 'ℹ️ The quiz is not paused.' : '▶️ Quiz resumed.');
  }

  private async showStatus(key: ChannelKey): Promise<void> {
    const snapshot = this.sessions.getProgress(key);
    if (snapshot) {
      return this.reply(key, formatStatus(snapshot, this.sessions.getSessionState(key), new Date()));
    }
    if (this.sessions.getSessionState(key) === 'completed') {
      return this.reply(key, '🏁 The last quiz in this chat has finished. Start another with /quiz <name>.');
    }
    await this.reply(key, NO_SESSION_MESSAGE);
  }

  private async setQuestionCount(key: ChannelKey, arg: string | undefined): Promise<void> {
    if (!arg) return this.reply(key, '❓ Usage: /set_questions <number|all>');

    if (arg.toLowerCase() === 'all') {
      this.settings.setQuestionCount(undefined);
      return this.reply(key, '✅ Quizzes will use all available questions.');
    }
    if (!/^\d+$/.test(arg)) return this.reply(key, `❌ "${arg}" is not a whole number.`);

    const result = this.settings.setQuestionCount(Number(arg));
    await this.reply(key, result.ok ? `✅ Questions per quiz set to ${arg}.` : userMessageFor(result.error));
  }

  private async setTimer(key: ChannelKey, arg: string | undefined): Promise<void> {
    if (!arg) return this.reply(key, '❓ Usage: /set_timer <seconds>');
    if (!/^\d+$/.test(arg)) return this.reply(key, `❌ "${arg}" is not a whole number.`);

    const result = this.settings.setTimerDuration(Number(arg));
    await this.reply(key, result.ok ? `✅ Timer set to ${arg} seconds per question.` : userMessageFor(result.error));
  }

  private listQuizzes(): QuizListing[] {
    return this.quizzes.listNames().map((name) => ({ name, questionCount: this.quizzes.getQuestionCount(name) }));
  }

  private async reply(key: ChannelKey, text: string): Promise<void> {
    try {
      await this.channel.send(key, text);
    } catch (error) {
      this.logger.error(`Failed to reply in chat ${key}: ${describeError(error)}`);
    }
  }
}

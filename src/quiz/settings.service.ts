import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { Env } from '../config/configuration';
import { QUESTION_COUNT_LIMITS, TIMER_DURATION_LIMITS } from './quiz.constants';
import { ConfigurationError, fail, ok, type Result } from './quiz.errors';
import { copySettings, type QuizSettings } from './session';

/**
 * Global quiz parameters applied to every new session. Seeded from the
 * environment and changed through the settings commands; sessions keep their
 * own copy, so a change never reaches a running quiz.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);
  private readonly defaults: QuizSettings;
  private settings: QuizSettings;

  constructor(config: ConfigService<Env, true>) {
    this.defaults = {
      randomOrder: config.get('QUIZ_RANDOM_ORDER', { infer: true }),
      timerDurationSeconds: config.get('QUIZ_TIMER_DURATION', { infer: true }),
    };
    const questionCount = config.get('QUIZ_QUESTION_COUNT', { infer: true });
    if (questionCount !== undefined) this.defaults.questionCount = questionCount;

    this.settings = copySettings(this.defaults);
  }

  getQuizSettings(): QuizSettings {
    return copySettings(this.settings);
  }

  /** `undefined` means every question in the set. */
  setQuestionCount(count: number | undefined): Result<QuizSettings, ConfigurationError> {
    if (count === undefined) {
      delete this.settings.questionCount;
      this.logger.log('Question count set to all available questions');
      return ok(this.getQuizSettings());
    }

    const { min, max } = QUESTION_COUNT_LIMITS;
    if (!Number.isInteger(count) || count < min || count > max) {
      return fail(new ConfigurationError(`Question count must be a whole number between ${min} and ${max}, got ${count}`));
    }

    this.settings.questionCount = count;
    this.logger.log(`Question count set to ${count}`);
    return ok(this.getQuizSettings());
  }

  setRandomOrder(randomOrder: boolean): QuizSettings {
    this.settings.randomOrder = randomOrder;
    this.logger.log(`Random order ${randomOrder ? 'enabled' : 'disabled'}`);
    return this.getQuizSettings();
  }

  toggleRandomOrder(): QuizSettings {
    return this.setRandomOrder(!this.settings.randomOrder);
  }

  setTimerDuration(seconds: number): Result<QuizSettings, ConfigurationError> {
    const { min, max } = TIMER_DURATION_LIMITS;
    if (!Number.isInteger(seconds) || seconds < min || seconds > max) {
      return fail(new ConfigurationError(`Timer duration must be a whole number between ${min} and ${max} seconds, got ${seconds}`));
    }

    this.settings.timerDurationSeconds = seconds;
    this.logger.log(`Timer duration set to ${seconds}s`);
    return ok(this.getQuizSettings());
  }

  reset(): QuizSettings {
    this.settings = copySettings(this.defaults);
    this.logger.log('Quiz settings reset to configured defaults');
    return this.getQuizSettings();
  }
}

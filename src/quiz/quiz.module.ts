import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import type { Env } from '../config/configuration';
import { TelegramModule } from '../telegram/telegram.module';
import { DEFAULT_QUIZ_TIMING, QUIZ_TIMING, type QuizTimingOptions } from './quiz.constants';
import { QuizSessionService } from './quiz-session.service';
import { QuizService } from './quiz.service';
import { SettingsService } from './settings.service';
import { TimerRegistry } from './timer-registry.service';

export function quizTimingFrom(config: ConfigService<Env, true>): QuizTimingOptions {
  return {
    ...DEFAULT_QUIZ_TIMING,
    advanceDelayMs: config.get('QUIZ_ADVANCE_DELAY_MS', { infer: true }),
    sweepIntervalMs: config.get('QUIZ_SWEEP_INTERVAL_MS', { infer: true }),
  };
}

@Module({
  imports: [TelegramModule],
  providers: [
    { provide: QUIZ_TIMING, inject: [ConfigService], useFactory: quizTimingFrom },
    QuizService,
    SettingsService,
    TimerRegistry,
    QuizSessionService,
  ],
  exports: [QuizService, SettingsService, QuizSessionService],
})
export class QuizModule {}

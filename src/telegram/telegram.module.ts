import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import TelegramBot from 'node-telegram-bot-api';

import type { Env } from '../config/configuration';
import { PRESENTATION_CHANNEL } from '../quiz/presentation.channel';
import { TELEGRAM_CLIENT, type TelegramClient } from './telegram.constants';
import { TelegramPresentationChannel } from './telegram-presentation.channel';

@Module({
  providers: [
    {
      provide: TELEGRAM_CLIENT,
      inject: [ConfigService],
      // Polling is started by the bot once every module is ready.
      useFactory: (config: ConfigService<Env, true>): TelegramClient =>
        new TelegramBot(config.get('BOT_TOKEN', { infer: true }), { polling: false }),
    },
    { provide: PRESENTATION_CHANNEL, useClass: TelegramPresentationChannel },
  ],
  exports: [TELEGRAM_CLIENT, PRESENTATION_CHANNEL],
})
export class TelegramModule {}

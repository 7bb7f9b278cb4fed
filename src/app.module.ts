import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { BotModule } from './bot/bot.module';
import { validateEnv } from './config/configuration';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }), BotModule],
})
export class AppModule {}

import { Module } from '@nestjs/common';

import { QuizModule } from '../quiz/quiz.module';
import { TelegramModule } from '../telegram/telegram.module';
import { BotService } from './bot.service';

@Module({
  imports: [QuizModule, TelegramModule],
  providers: [BotService],
})
export class BotModule {}

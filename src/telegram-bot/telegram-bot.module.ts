import { Module } from '@nestjs/common';
import { TelegramModule } from '../telegram/telegram.module';
import { PasswordResetModule } from '../password-reset/password-reset.module';
import { TelegramBotService } from './telegram-bot.service';

@Module({
  imports: [TelegramModule, PasswordResetModule],
  providers: [TelegramBotService],
})
export class TelegramBotModule { }

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { DeliveryModule } from './delivery/delivery.module';
import { TasksModule } from './tasks/tasks.module';
import { TelegramBotModule } from './telegram-bot/telegram-bot.module';

/** Worker process: delivery loop, housekeeping crons and the Telegram bot. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ScheduleModule.forRoot(),
    DatabaseModule,
    DeliveryModule,
    TasksModule,
    TelegramBotModule,
  ],
})
export class WorkerModule { }

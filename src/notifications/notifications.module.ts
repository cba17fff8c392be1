import { Module } from '@nestjs/common';
import { EmailModule } from '../email/email.module';
import { TelegramModule } from '../telegram/telegram.module';
import { NOTIFICATION_CHANNELS, NotificationChannel } from './notification-channel';
import { EmailNotificationChannel } from './email-notification.channel';
import { TelegramNotificationChannel } from './telegram-notification.channel';

@Module({
  imports: [EmailModule, TelegramModule],
  providers: [
    EmailNotificationChannel,
    TelegramNotificationChannel,
    {
      provide: NOTIFICATION_CHANNELS,
      inject: [EmailNotificationChannel, TelegramNotificationChannel],
      useFactory: (
        email: EmailNotificationChannel,
        telegram: TelegramNotificationChannel,
      ): NotificationChannel[] => [email, telegram],
    },
  ],
  exports: [NOTIFICATION_CHANNELS],
})
export class NotificationsModule { }

import { Injectable } from '@nestjs/common';
import { TelegramApiError, TelegramClient } from '../telegram/telegram.client';
import {
  DeliveryResult,
  NotificationChannel,
  ResetLinkMessage,
} from './notification-channel';

export function formatResetMessage(message: ResetLinkMessage): string {
  return [
    'A password reset was requested for your account.',
    '',
    'Open this link to choose a new password:',
    message.resetUrl,
    '',
    `The link expires in ${message.expiresInMinutes} minutes. If you didn't request this, ignore this message.`,
  ].join('\n');
}

@Injectable()
export class TelegramNotificationChannel implements NotificationChannel {
  readonly name = 'telegram';

  constructor(private readonly telegramClient: TelegramClient) { }

  async send(recipient: string, message: ResetLinkMessage): Promise<DeliveryResult> {
    try {
      await this.telegramClient.sendMessage(recipient, formatResetMessage(message));
      return { status: 'sent' };
    } catch (error) {
      if (error instanceof TelegramApiError) {
        return error.retryable
          ? { status: 'transient_failure', reason: error.message }
          : { status: 'permanent_failure', reason: error.message };
      }
      throw error;
    }
  }
}

import { Injectable } from '@nestjs/common';
import { EmailDeliveryError, EmailService } from '../email/email.service';
import {
  DeliveryResult,
  NotificationChannel,
  ResetLinkMessage,
} from './notification-channel';

@Injectable()
export class EmailNotificationChannel implements NotificationChannel {
  readonly name = 'email';

  constructor(private readonly emailService: EmailService) { }

  async send(recipient: string, message: ResetLinkMessage): Promise<DeliveryResult> {
    try {
      await this.emailService.sendPasswordResetEmail(
        recipient,
        message.resetUrl,
        message.expiresInMinutes,
      );
      return { status: 'sent' };
    } catch (error) {
      if (error instanceof EmailDeliveryError) {
        return error.retryable
          ? { status: 'transient_failure', reason: error.message }
          : { status: 'permanent_failure', reason: error.message };
      }
      throw error;
    }
  }
}

import { EmailDeliveryError, EmailService } from '../email/email.service';
import { TelegramApiError, TelegramClient } from '../telegram/telegram.client';
import { EmailNotificationChannel } from './email-notification.channel';
import {
  formatResetMessage,
  TelegramNotificationChannel,
} from './telegram-notification.channel';
import { ResetLinkMessage } from './notification-channel';

describe('Notification channels', () => {
  const message: ResetLinkMessage = {
    resetUrl: 'http://localhost:5173/reset-password?token=abc',
    expiresInMinutes: 30,
  };

  describe('EmailNotificationChannel', () => {
    let sendPasswordResetEmail: jest.Mock;
    let channel: EmailNotificationChannel;

    beforeEach(() => {
      sendPasswordResetEmail = jest.fn();
      const emailService = { sendPasswordResetEmail } as unknown as EmailService;
      channel = new EmailNotificationChannel(emailService);
    });

    it('should send the link and report sent', async () => {
      sendPasswordResetEmail.mockResolvedValue(undefined);

      await expect(channel.send('user@example.com', message)).resolves.toEqual({ status: 'sent' });
      expect(sendPasswordResetEmail).toHaveBeenCalledWith(
        'user@example.com',
        'http://localhost:5173/reset-password?token=abc',
        30,
      );
    });

    it('should map a retryable provider error to a transient failure', async () => {
      sendPasswordResetEmail.mockRejectedValue(
        new EmailDeliveryError('Failed to send email: HTTP 503', true),
      );

      await expect(channel.send('user@example.com', message)).resolves.toEqual({
        status: 'transient_failure',
        reason: 'Failed to send email: HTTP 503',
      });
    });

    it('should map a non-retryable provider error to a permanent failure', async () => {
      sendPasswordResetEmail.mockRejectedValue(
        new EmailDeliveryError('Email sending is not configured', false),
      );

      await expect(channel.send('user@example.com', message)).resolves.toEqual({
        status: 'permanent_failure',
        reason: 'Email sending is not configured',
      });
    });

    it('should rethrow unexpected errors', async () => {
      sendPasswordResetEmail.mockRejectedValue(new TypeError('boom'));

      await expect(channel.send('user@example.com', message)).rejects.toThrow('boom');
    });
  });

  describe('TelegramNotificationChannel', () => {
    let sendMessage: jest.Mock;
    let channel: TelegramNotificationChannel;

    beforeEach(() => {
      sendMessage = jest.fn();
      const telegramClient = { sendMessage } as unknown as TelegramClient;
      channel = new TelegramNotificationChannel(telegramClient);
    });

    it('should message the linked chat with the reset link', async () => {
      sendMessage.mockResolvedValue(undefined);

      await expect(channel.send('424242', message)).resolves.toEqual({ status: 'sent' });
      expect(sendMessage).toHaveBeenCalledWith('424242', formatResetMessage(message));
    });

    it('should classify Telegram API errors by retryability', async () => {
      sendMessage.mockRejectedValueOnce(
        new TelegramApiError('Telegram sendMessage failed: Too Many Requests', {
          errorCode: 429,
          retryable: true,
        }),
      );
      sendMessage.mockRejectedValueOnce(
        new TelegramApiError('Telegram sendMessage failed: Forbidden: bot was blocked by the user', {
          errorCode: 403,
          retryable: false,
        }),
      );

      await expect(channel.send('424242', message)).resolves.toEqual({
        status: 'transient_failure',
        reason: 'Telegram sendMessage failed: Too Many Requests',
      });
      await expect(channel.send('424242', message)).resolves.toEqual({
        status: 'permanent_failure',
        reason: 'Telegram sendMessage failed: Forbidden: bot was blocked by the user',
      });
    });
  });

  describe('formatResetMessage', () => {
    it('should include the link and the remaining lifetime', () => {
      expect(formatResetMessage(message)).toBe(
        [
          'A password reset was requested for your account.',
          '',
          'Open this link to choose a new password:',
          'http://localhost:5173/reset-password?token=abc',
          '',
          "The link expires in 30 minutes. If you didn't request this, ignore this message.",
        ].join('\n'),
      );
    });
  });
});

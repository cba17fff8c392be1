import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { isRecord } from '../utils/is-record';

const PLUNK_API_URL = 'https://next-api.useplunk.com/v1/send';
const REQUEST_TIMEOUT_MS = 10_000;

export class EmailDeliveryError extends Error {
  constructor(
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EmailDeliveryError';
  }
}

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name);
  private readonly secretKey: string | undefined;
  private readonly fromEmail: string | undefined;

  constructor(private readonly configService: ConfigService) {
    this.secretKey = this.configService.get<string>('plunk.secretKey');
    this.fromEmail = this.configService.get<string>('plunk.fromEmail');

    if (!this.secretKey || !this.fromEmail) {
      this.logger.warn('PLUNK_SECRET_KEY or PLUNK_FROM_EMAIL is not set; reset emails will not be sent');
    }
  }

  async sendPasswordResetEmail(
    to: string,
    resetUrl: string,
    expiresInMinutes: number,
  ): Promise<void> {
    const subject = 'Reset your password';
    const body = `
      <p>A password reset was requested for this account.</p>
      <p><a href="${resetUrl}">Click here to reset your password</a></p>
      <p>This link expires in ${expiresInMinutes} minutes.</p>
      <p>If you didn't request this, ignore this email.</p>
    `;

    await this.send(to, subject, body);
  }

  private async send(to: string, subject: string, body: string): Promise<void> {
    if (!this.secretKey || !this.fromEmail) {
      throw new EmailDeliveryError('Email sending is not configured', false);
    }

    let response: Response;
    try {
      response = await fetch(PLUNK_API_URL, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.secretKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({ to, subject, body, from: this.fromEmail }),
        signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
      });
    } catch (error) {
      throw new EmailDeliveryError('Email provider unreachable', true, { cause: error });
    }

    const data: unknown = await response.json().catch(() => undefined);

    if (!response.ok || !isRecord(data) || data.success !== true) {
      const providerError =
        isRecord(data) && isRecord(data.error) && typeof data.error.message === 'string'
          ? data.error.message
          : `HTTP ${response.status}`;
      this.logger.error(`Failed to send email: ${providerError}`);
      throw new EmailDeliveryError(
        `Failed to send email: ${providerError}`,
        response.status === 429 || response.status >= 500,
      );
    }
  }
}

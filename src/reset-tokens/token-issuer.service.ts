import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomBytes } from 'node:crypto';
import { requirePositiveDuration } from '../utils/parse-expiration';
import { ResetTokensRepository } from './reset-tokens.repository';
import { DeliveryTarget, ResetToken } from './reset-token.types';

// 256 bits, url-safe so it can sit in a query string untouched
export function generateTokenId(): string {
  return randomBytes(32).toString('base64url');
}

@Injectable()
export class TokenIssuerService {
  private readonly logger = new Logger(TokenIssuerService.name);
  private readonly ttlMs: number;

  constructor(
    private readonly resetTokensRepository: ResetTokensRepository,
    configService: ConfigService,
  ) {
    this.ttlMs = requirePositiveDuration(
      'resetToken.ttl',
      configService.getOrThrow<string>('resetToken.ttl'),
    );
  }

  /**
   * Issue a fresh pending token for an account, revoking whichever token was
   * active before. Account existence is the caller's concern.
   */
  async issue(
    accountRef: string,
    target: DeliveryTarget,
    now = new Date(),
  ): Promise<ResetToken> {
    const token = await this.resetTokensRepository.issue({
      id: generateTokenId(),
      accountRef,
      state: 'pending',
      channel: target.channel,
      recipient: target.recipient,
      createdAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + this.ttlMs).toISOString(),
    });

    this.logger.log(
      `Issued reset token for account ${accountRef} (channel: ${target.channel}, expires ${token.expiresAt})`,
    );

    return token;
  }
}

import {
  BadRequestException,
  Injectable,
  InternalServerErrorException,
  Logger,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as bcrypt from 'bcryptjs';
import { setTimeout as sleep } from 'node:timers/promises';
import { User, UsersService } from '../users/users.service';
import { TokenIssuerService } from '../reset-tokens/token-issuer.service';
import { RedemptionService } from '../reset-tokens/redemption.service';
import {
  DeliveryTarget,
  RedemptionFailure,
} from '../reset-tokens/reset-token.types';

export const RESET_REQUESTED_MESSAGE =
  'If an account exists for that email, a password reset link is on its way.';

export const PASSWORD_UPDATED_MESSAGE = 'Your password has been updated.';

// kept alike on purpose: none of them reveals whose token it was
export const REDEMPTION_FAILURE_MESSAGES: Record<RedemptionFailure, string> = {
  invalid: 'This reset link is invalid. Please request a new one.',
  revoked: 'This reset link is invalid. Please request a new one.',
  expired: 'This reset link has expired. Please request a new one.',
  already_used: 'This reset link has already been used. Please request a new one.',
};

export const CREDENTIAL_UPDATE_FAILED_MESSAGE =
  'This reset link has been used, but your password could not be changed. Please request a new reset link.';

@Injectable()
export class PasswordResetService {
  private readonly logger = new Logger(PasswordResetService.name);
  private readonly minResponseMs: number;

  constructor(
    private readonly usersService: UsersService,
    private readonly tokenIssuer: TokenIssuerService,
    private readonly redemptionService: RedemptionService,
    configService: ConfigService,
  ) {
    this.minResponseMs = configService.getOrThrow<number>('passwordReset.minResponseMs');
  }

  /**
   * Start a reset. Answers the same way, and takes at least the configured
   * minimum time, whether or not the email belongs to an account.
   */
  async requestReset(email: string): Promise<{ message: string }> {
    const startedAt = Date.now();

    try {
      const user = await this.usersService.findByEmail(email);
      if (user) {
        await this.tokenIssuer.issue(user.id, this.deliveryTargetFor(user));
      } else {
        this.logger.debug('Password reset requested for an unknown email');
      }
    } finally {
      const remaining = this.minResponseMs - (Date.now() - startedAt);
      if (remaining > 0) {
        await sleep(remaining);
      }
    }

    return { message: RESET_REQUESTED_MESSAGE };
  }

  async verifyToken(token: string): Promise<{ valid: true; expiresAt: string }> {
    const inspection = await this.redemptionService.inspect(token);

    if (inspection.status !== 'redeemable') {
      throw new BadRequestException(REDEMPTION_FAILURE_MESSAGES[inspection.status]);
    }

    return { valid: true, expiresAt: inspection.expiresAt };
  }

  /**
   * Redeem the token and set the new password. Once redeemed the token stays
   * consumed even if the password write fails.
   */
  async completeReset(token: string, password: string): Promise<{ message: string }> {
    // Hash with cost factor 12 before touching the token
    const hashedPassword = await bcrypt.hash(password, 12);

    const outcome = await this.redemptionService.redeem(token);
    if (outcome.status !== 'ok') {
      throw new BadRequestException(REDEMPTION_FAILURE_MESSAGES[outcome.status]);
    }

    try {
      await this.usersService.updatePassword(outcome.accountRef, hashedPassword);
    } catch (error) {
      this.logger.error(
        `Password update failed for account ${outcome.accountRef} after its reset token was consumed`,
        error instanceof Error ? error.stack : String(error),
      );
      throw new InternalServerErrorException(CREDENTIAL_UPDATE_FAILED_MESSAGE);
    }

    this.logger.log(`Password reset completed for account ${outcome.accountRef}`);
    return { message: PASSWORD_UPDATED_MESSAGE };
  }

  private deliveryTargetFor(user: User): DeliveryTarget {
    if (user.telegramChatId) {
      return { channel: 'telegram', recipient: user.telegramChatId };
    }
    return { channel: 'email', recipient: user.email };
  }
}

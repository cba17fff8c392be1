import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'node:timers/promises';
import { StoreUnavailableError } from '../database/store-unavailable.error';
import {
  DeliveryResult,
  NOTIFICATION_CHANNELS,
  NotificationChannel,
} from '../notifications/notification-channel';
import { ResetTokensRepository } from '../reset-tokens/reset-tokens.repository';
import {
  ClaimOptions,
  DeliveryChannel,
  ResetToken,
} from '../reset-tokens/reset-token.types';
import { buildResetUrl, minutesUntil } from './reset-link';

const MARK_DELIVERED_ATTEMPTS = 3;
const MARK_DELIVERED_BACKOFF_MS = 100;

export interface DispatchSummary {
  fetched: number;
  delivered: number;
  // claimed by another worker first
  skipped: number;
  retrying: number;
  failed: number;
}

type TokenDispatch = Exclude<keyof DispatchSummary, 'fetched'>;

@Injectable()
export class DeliveryDispatcherService {
  private readonly logger = new Logger(DeliveryDispatcherService.name);
  private readonly channels = new Map<DeliveryChannel, NotificationChannel>();
  private readonly batchSize: number;
  private readonly maxAttempts: number;
  private readonly frontendUrl: string;
  private readonly resetPath: string;

  constructor(
    private readonly resetTokensRepository: ResetTokensRepository,
    @Inject(NOTIFICATION_CHANNELS) channels: NotificationChannel[],
    configService: ConfigService,
  ) {
    for (const channel of channels) {
      this.channels.set(channel.name, channel);
    }
    this.batchSize = configService.getOrThrow<number>('delivery.batchSize');
    this.maxAttempts = configService.getOrThrow<number>('delivery.maxAttempts');
    this.frontendUrl = configService.getOrThrow<string>('frontend.url');
    this.resetPath = configService.getOrThrow<string>('frontend.resetPath');
  }

  /**
   * One delivery cycle: fetch a bounded batch of pending tokens and try each
   * one in turn. A token is only sent after this process has claimed it.
   */
  async dispatchPending(now = new Date()): Promise<DispatchSummary> {
    const claimOptions: ClaimOptions = {
      now,
      maxAttempts: this.maxAttempts,
    };

    const batch = await this.resetTokensRepository.fetchPending({
      ...claimOptions,
      limit: this.batchSize,
    });

    const summary: DispatchSummary = {
      fetched: batch.length,
      delivered: 0,
      skipped: 0,
      retrying: 0,
      failed: 0,
    };

    for (const token of batch) {
      summary[await this.dispatch(token, claimOptions)] += 1;
    }

    if (summary.fetched > 0) {
      this.logger.log(
        `Delivery cycle: ${summary.delivered} delivered, ${summary.retrying} retrying, ${summary.failed} failed, ${summary.skipped} skipped`,
      );
    }

    return summary;
  }

  private async dispatch(token: ResetToken, claimOptions: ClaimOptions): Promise<TokenDispatch> {
    const claimed = await this.resetTokensRepository.claimForDelivery(token.id, claimOptions);
    if (!claimed) {
      return 'skipped';
    }

    const claimedAt = claimOptions.now.toISOString();
    const attempt = token.deliveryAttempts + 1;
    const result = await this.send(token, claimOptions.now);

    switch (result.status) {
      case 'sent':
        await this.recordDelivered(token, claimOptions.now);
        return 'delivered';
      case 'transient_failure': {
        await this.resetTokensRepository.releaseClaim(token.id, claimedAt, result.reason);
        if (attempt >= this.maxAttempts) {
          this.logger.error(
            `Giving up on reset link for account ${token.accountRef} after ${attempt} attempts (${result.reason}); token stays pending until ${token.expiresAt}`,
          );
        } else {
          this.logger.warn(
            `Delivery attempt ${attempt}/${this.maxAttempts} for account ${token.accountRef} failed: ${result.reason}`,
          );
        }
        return 'retrying';
      }
      case 'permanent_failure': {
        await this.resetTokensRepository.markDeliveryFailed(
          token.id,
          claimedAt,
          result.reason,
          claimOptions.now,
        );
        this.logger.error(
          `Reset link for account ${token.accountRef} cannot be delivered via ${token.channel}: ${result.reason}`,
        );
        return 'failed';
      }
    }
  }

  /**
   * Mark a sent token delivered, retrying a few times while the store is
   * unavailable. If it never succeeds the claim stays in place, so no later
   * cycle sends the link again.
   */
  private async recordDelivered(token: ResetToken, now: Date): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        const marked = await this.resetTokensRepository.markDelivered(token.id, now);
        if (marked !== 'success') {
          this.logger.warn(`Reset link for account ${token.accountRef} was sent, but marking it delivered returned ${marked}`);
        }
        return;
      } catch (error) {
        if (!(error instanceof StoreUnavailableError)) {
          throw error;
        }
        if (attempt >= MARK_DELIVERED_ATTEMPTS) {
          this.logger.error(
            `Reset link for account ${token.accountRef} was sent, but could not be marked delivered after ${attempt} attempts; it stays claimed and will not be resent`,
            error.stack,
          );
          return;
        }
        await sleep(MARK_DELIVERED_BACKOFF_MS * attempt);
      }
    }
  }

  private async send(token: ResetToken, now: Date): Promise<DeliveryResult> {
    const channel = this.channels.get(token.channel);
    if (!channel) {
      return { status: 'permanent_failure', reason: `No notification channel for ${token.channel}` };
    }

    try {
      return await channel.send(token.recipient, {
        resetUrl: buildResetUrl(this.frontendUrl, this.resetPath, token.id),
        expiresInMinutes: minutesUntil(token.expiresAt, now),
      });
    } catch (error) {
      return {
        status: 'transient_failure',
        reason: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ResetTokensRepository } from '../reset-tokens/reset-tokens.repository';
import { requirePositiveDuration } from '../utils/parse-expiration';

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);
  private readonly retentionMs: number;

  constructor(
    private readonly resetTokensRepository: ResetTokensRepository,
    configService: ConfigService,
  ) {
    this.retentionMs = requirePositiveDuration(
      'resetToken.retention',
      configService.getOrThrow<string>('resetToken.retention'),
    );
  }

  // Redemption checks expiry itself; this only keeps stored states current
  @Cron(CronExpression.EVERY_5_MINUTES, {
    name: 'expire-reset-tokens',
  })
  async expireResetTokens() {
    const expired = await this.resetTokensRepository.markExpiredSweep(new Date());

    if (expired > 0) {
      this.logger.log(`Expiry sweep: ${expired} reset tokens expired`);
    }
    return expired;
  }

  // Remove finished tokens daily at midnight once past the retention window
  @Cron(CronExpression.EVERY_DAY_AT_MIDNIGHT, {
    name: 'purge-reset-tokens',
  })
  async purgeResetTokens() {
    this.logger.log('Starting reset token purge...');

    const cutoff = new Date(Date.now() - this.retentionMs);
    const removed = await this.resetTokensRepository.purgeTerminalBefore(cutoff);

    this.logger.log(`Reset token purge completed: ${removed} tokens removed`);
    return removed;
  }
}

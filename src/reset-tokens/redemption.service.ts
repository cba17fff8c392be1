import { Injectable, Logger } from '@nestjs/common';
import { ResetTokensRepository } from './reset-tokens.repository';
import { evaluateRedeemability, Redeemability } from './reset-token.rules';
import { RedemptionOutcome } from './reset-token.types';

export type TokenInspection =
  | { status: 'redeemable'; expiresAt: string }
  | { status: Exclude<Redeemability, 'redeemable'> };

@Injectable()
export class RedemptionService {
  private readonly logger = new Logger(RedemptionService.name);

  constructor(private readonly resetTokensRepository: ResetTokensRepository) { }

  /**
   * Consume a presented token. Among concurrent callers presenting the same
   * valid token exactly one gets `ok`; the rest get `already_used`.
   */
  async redeem(tokenId: string, now = new Date()): Promise<RedemptionOutcome> {
    if (!tokenId) {
      return { status: 'invalid' };
    }

    const outcome = await this.resetTokensRepository.markConsumedIfValid(tokenId, now);

    if (outcome.status === 'ok') {
      this.logger.log(`Reset token redeemed for account ${outcome.accountRef}`);
    } else {
      this.logger.debug(`Reset token rejected: ${outcome.status}`);
    }

    return outcome;
  }

  /** Read-only check used to decide whether to show the reset form. */
  async inspect(tokenId: string, now = new Date()): Promise<TokenInspection> {
    if (!tokenId) {
      return { status: 'invalid' };
    }

    const token = await this.resetTokensRepository.findById(tokenId);
    if (!token) {
      return { status: 'invalid' };
    }

    const verdict = evaluateRedeemability(token, now);
    return verdict === 'redeemable'
      ? { status: 'redeemable', expiresAt: token.expiresAt }
      : { status: verdict };
  }
}

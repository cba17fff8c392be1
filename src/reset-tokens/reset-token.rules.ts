import {
  RedemptionFailure,
  ResetToken,
  ResetTokenState,
} from './reset-token.types';

export type Redeemability = 'redeemable' | RedemptionFailure;

export function isActiveState(state: ResetTokenState): boolean {
  return state === 'pending' || state === 'delivered';
}

/**
 * Decide whether a stored token may be redeemed at `now`.
 *
 * Order matters: a consumed token reports `already_used` even once it is past
 * expiry, and any other token past `expires_at` reports `expired` whatever
 * its stored state says.
 */
export function evaluateRedeemability(
  token: ResetToken | undefined,
  now: Date,
): Redeemability {
  if (!token) {
    return 'invalid';
  }

  if (token.state === 'consumed') {
    return 'already_used';
  }

  if (token.expiresAt <= now.toISOString() || token.state === 'expired') {
    return 'expired';
  }

  // only revoked is left among the inactive states
  if (!isActiveState(token.state)) {
    return 'revoked';
  }

  return 'redeemable';
}

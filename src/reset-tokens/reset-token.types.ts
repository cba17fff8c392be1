import {
  DELIVERY_CHANNELS,
  RESET_TOKEN_STATES,
  resetTokens,
} from '../database/schema';

export type ResetToken = typeof resetTokens.$inferSelect;
export type NewResetToken = typeof resetTokens.$inferInsert;

export type ResetTokenState = (typeof RESET_TOKEN_STATES)[number];
export type DeliveryChannel = (typeof DELIVERY_CHANNELS)[number];

export const ACTIVE_STATES = ['pending', 'delivered'] as const satisfies readonly ResetTokenState[];
export const TERMINAL_STATES = ['consumed', 'expired', 'revoked'] as const satisfies readonly ResetTokenState[];

/** Where the link for a token is sent. */
export interface DeliveryTarget {
  channel: DeliveryChannel;
  recipient: string;
}

export type RedemptionFailure = 'invalid' | 'expired' | 'already_used' | 'revoked';

export type RedemptionOutcome =
  | { status: 'ok'; accountRef: string }
  | { status: RedemptionFailure };

export type MarkDeliveredResult =
  | 'success'
  | 'already_delivered'
  | 'not_found'
  // row exists but left pending without a delivery (revoked, consumed or expired)
  | 'inactive';

export interface ClaimOptions {
  now: Date;
  maxAttempts: number;
}

export interface FetchPendingOptions extends ClaimOptions {
  limit: number;
}

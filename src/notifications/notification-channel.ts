import { DeliveryChannel } from '../reset-tokens/reset-token.types';

export const NOTIFICATION_CHANNELS = Symbol('NOTIFICATION_CHANNELS');

export interface ResetLinkMessage {
  resetUrl: string;
  expiresInMinutes: number;
}

export type DeliveryResult =
  | { status: 'sent' }
  | { status: 'transient_failure'; reason: string }
  | { status: 'permanent_failure'; reason: string };

/**
 * A transport that can hand a reset link to the account owner. Implementations
 * report failures as results; anything they throw is treated as transient.
 */
export interface NotificationChannel {
  readonly name: DeliveryChannel;
  send(recipient: string, message: ResetLinkMessage): Promise<DeliveryResult>;
}

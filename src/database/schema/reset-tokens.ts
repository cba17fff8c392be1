import { sql } from 'drizzle-orm';
import {
  sqliteTable,
  text,
  integer,
  index,
  uniqueIndex,
} from 'drizzle-orm/sqlite-core';
import { users } from './users';

export const RESET_TOKEN_STATES = [
  'pending',
  'delivered',
  'consumed',
  'expired',
  'revoked',
] as const;

export const DELIVERY_CHANNELS = ['email', 'telegram'] as const;

export const resetTokens = sqliteTable(
  'reset_tokens',
  {
    // the bearer secret embedded in the reset link
    id: text('id').primaryKey(),
    accountRef: text('account_ref')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    state: text('state', { enum: RESET_TOKEN_STATES }).notNull().default('pending'),
    channel: text('channel', { enum: DELIVERY_CHANNELS }).notNull(),
    recipient: text('recipient').notNull(),
    deliveryAttempts: integer('delivery_attempts').notNull().default(0),
    claimedAt: text('claimed_at'),
    lastDeliveryError: text('last_delivery_error'),
    deliveryFailedAt: text('delivery_failed_at'),
    createdAt: text('created_at').notNull(),
    expiresAt: text('expires_at').notNull(),
    deliveredAt: text('delivered_at'),
    consumedAt: text('consumed_at'),
  },
  (table) => [
    index('reset_tokens_account_state_idx').on(table.accountRef, table.state),
    index('reset_tokens_state_created_idx').on(table.state, table.createdAt),
    uniqueIndex('reset_tokens_one_active_per_account')
      .on(table.accountRef)
      .where(sql`state in ('pending', 'delivered')`),
  ],
);

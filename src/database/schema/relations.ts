import { relations } from 'drizzle-orm';
import { users } from './users';
import { resetTokens } from './reset-tokens';

export const usersRelations = relations(users, ({ many }) => ({
  resetTokens: many(resetTokens),
}));

export const resetTokensRelations = relations(resetTokens, ({ one }) => ({
  account: one(users, {
    fields: [resetTokens.accountRef],
    references: [users.id],
  }),
}));

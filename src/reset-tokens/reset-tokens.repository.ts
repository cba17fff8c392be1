import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { and, asc, eq, gt, inArray, isNull, lt, lte, sql } from 'drizzle-orm';
import { DatabaseService } from '../database/database.service';
import { resetTokens } from '../database/schema';
import { StoreUnavailableError } from '../database/store-unavailable.error';
import { requirePositiveDuration } from '../utils/parse-expiration';
import { evaluateRedeemability } from './reset-token.rules';
import {
  ACTIVE_STATES,
  ClaimOptions,
  FetchPendingOptions,
  MarkDeliveredResult,
  NewResetToken,
  RedemptionOutcome,
  ResetToken,
  TERMINAL_STATES,
} from './reset-token.types';

/**
 * Token store shared by the web and worker processes.
 *
 * Every state change is a single conditional statement (or one batch, which
 * libsql runs as a transaction), so the lifecycle rules hold no matter how
 * many processes call in concurrently.
 */
@Injectable()
export class ResetTokensRepository {
  private readonly queryTimeoutMs: number;

  constructor(
    private readonly databaseService: DatabaseService,
    configService: ConfigService,
  ) {
    this.queryTimeoutMs = requirePositiveDuration(
      'database.queryTimeout',
      configService.getOrThrow<string>('database.queryTimeout'),
    );
  }

  private get db() {
    return this.databaseService.db;
  }

  /** Round trip used by the health check. */
  async ping(): Promise<void> {
    await this.run('ping', () => this.db.run(sql`SELECT 1`));
  }

  async findById(id: string): Promise<ResetToken | undefined> {
    return this.run('findById', () =>
      this.db.query.resetTokens.findFirst({
        where: eq(resetTokens.id, id),
      }),
    );
  }

  async insertToken(values: NewResetToken): Promise<ResetToken> {
    return this.run('insertToken', async () => {
      const [token] = await this.db.insert(resetTokens).values(values).returning();
      return token;
    });
  }

  async revokeActiveForAccount(accountRef: string): Promise<number> {
    return this.run('revokeActiveForAccount', async () => {
      const result = await this.db
        .update(resetTokens)
        .set({ state: 'revoked' })
        .where(
          and(
            eq(resetTokens.accountRef, accountRef),
            inArray(resetTokens.state, [...ACTIVE_STATES]),
          ),
        );
      return result.rowsAffected;
    });
  }

  /**
   * Revoke the account's active token and insert its replacement in one
   * batch, so two active tokens never coexist.
   */
  async issue(values: NewResetToken): Promise<ResetToken> {
    return this.run('issue', async () => {
      const [, inserted] = await this.db.batch([
        this.db
          .update(resetTokens)
          .set({ state: 'revoked' })
          .where(
            and(
              eq(resetTokens.accountRef, values.accountRef),
              inArray(resetTokens.state, [...ACTIVE_STATES]),
            ),
          ),
        this.db.insert(resetTokens).values(values).returning(),
      ]);
      return inserted[0];
    });
  }

  async countActiveForAccount(accountRef: string): Promise<number> {
    return this.run('countActiveForAccount', () =>
      this.db.$count(
        resetTokens,
        and(
          eq(resetTokens.accountRef, accountRef),
          inArray(resetTokens.state, [...ACTIVE_STATES]),
        ),
      ),
    );
  }

  /** Pending tokens that a worker could claim right now, oldest first. */
  async fetchPending(options: FetchPendingOptions): Promise<ResetToken[]> {
    return this.run('fetchPending', () =>
      this.db
        .select()
        .from(resetTokens)
        .where(this.claimable(options))
        .orderBy(asc(resetTokens.createdAt))
        .limit(options.limit),
    );
  }

  /**
   * Take exclusive responsibility for delivering one token. Exactly one of
   * any number of concurrent callers gets `true`. A claim is never taken
   * over: a worker that dies mid-send leaves the token pending and claimed
   * until it expires, so the link is never sent twice.
   */
  async claimForDelivery(id: string, options: ClaimOptions): Promise<boolean> {
    return this.run('claimForDelivery', async () => {
      const claimed = await this.db
        .update(resetTokens)
        .set({
          claimedAt: options.now.toISOString(),
          deliveryAttempts: sql`${resetTokens.deliveryAttempts} + 1`,
        })
        .where(and(eq(resetTokens.id, id), this.claimable(options)))
        .returning({ id: resetTokens.id });
      return claimed.length === 1;
    });
  }

  /** Give a claim back after a transient failure so a later cycle retries. */
  async releaseClaim(id: string, claimedAt: string, reason: string): Promise<void> {
    await this.run('releaseClaim', () =>
      this.db
        .update(resetTokens)
        .set({ claimedAt: null, lastDeliveryError: reason })
        .where(
          and(
            eq(resetTokens.id, id),
            eq(resetTokens.state, 'pending'),
            eq(resetTokens.claimedAt, claimedAt),
          ),
        ),
    );
  }

  /**
   * Record a permanent delivery failure. The token stays pending until it
   * expires, but is no longer fetched for delivery.
   */
  async markDeliveryFailed(
    id: string,
    claimedAt: string,
    reason: string,
    now: Date,
  ): Promise<void> {
    await this.run('markDeliveryFailed', () =>
      this.db
        .update(resetTokens)
        .set({
          claimedAt: null,
          lastDeliveryError: reason,
          deliveryFailedAt: now.toISOString(),
        })
        .where(
          and(
            eq(resetTokens.id, id),
            eq(resetTokens.state, 'pending'),
            eq(resetTokens.claimedAt, claimedAt),
          ),
        ),
    );
  }

  async markDelivered(id: string, now: Date): Promise<MarkDeliveredResult> {
    const updated = await this.run('markDelivered', () =>
      this.db
        .update(resetTokens)
        .set({
          state: 'delivered',
          deliveredAt: now.toISOString(),
          claimedAt: null,
        })
        .where(and(eq(resetTokens.id, id), eq(resetTokens.state, 'pending')))
        .returning({ id: resetTokens.id }),
    );

    if (updated.length === 1) {
      return 'success';
    }

    const token = await this.findById(id);
    if (!token) {
      return 'not_found';
    }

    return token.deliveredAt ? 'already_delivered' : 'inactive';
  }

  /**
   * Consume the token if it is still redeemable at `now`. Only one caller
   * can ever win the first update; everyone else falls through to a read of
   * the row as the winner left it.
   */
  async markConsumedIfValid(id: string, now: Date): Promise<RedemptionOutcome> {
    const nowIso = now.toISOString();

    const consumed = await this.run('markConsumedIfValid', () =>
      this.db
        .update(resetTokens)
        .set({ state: 'consumed', consumedAt: nowIso, claimedAt: null })
        .where(
          and(
            eq(resetTokens.id, id),
            inArray(resetTokens.state, [...ACTIVE_STATES]),
            gt(resetTokens.expiresAt, nowIso),
          ),
        )
        .returning({ accountRef: resetTokens.accountRef }),
    );

    if (consumed.length === 1) {
      return { status: 'ok', accountRef: consumed[0].accountRef };
    }

    const expired = await this.run('markConsumedIfValid', () =>
      this.db
        .update(resetTokens)
        .set({ state: 'expired', claimedAt: null })
        .where(
          and(
            eq(resetTokens.id, id),
            inArray(resetTokens.state, [...ACTIVE_STATES]),
            lte(resetTokens.expiresAt, nowIso),
          ),
        )
        .returning({ id: resetTokens.id }),
    );

    if (expired.length === 1) {
      return { status: 'expired' };
    }

    const verdict = evaluateRedeemability(await this.findById(id), now);
    // states only move forward, so a still-redeemable row cannot be seen here; fail closed
    return verdict === 'redeemable' ? { status: 'invalid' } : { status: verdict };
  }

  async markExpiredSweep(now: Date): Promise<number> {
    return this.run('markExpiredSweep', async () => {
      const result = await this.db
        .update(resetTokens)
        .set({ state: 'expired', claimedAt: null })
        .where(
          and(
            inArray(resetTokens.state, [...ACTIVE_STATES]),
            lte(resetTokens.expiresAt, now.toISOString()),
          ),
        );
      return result.rowsAffected;
    });
  }

  /** Delete terminal rows whose expiry lies before `cutoff`. */
  async purgeTerminalBefore(cutoff: Date): Promise<number> {
    return this.run('purgeTerminalBefore', async () => {
      const result = await this.db
        .delete(resetTokens)
        .where(
          and(
            inArray(resetTokens.state, [...TERMINAL_STATES]),
            lt(resetTokens.expiresAt, cutoff.toISOString()),
          ),
        );
      return result.rowsAffected;
    });
  }

  private claimable(options: ClaimOptions) {
    return and(
      eq(resetTokens.state, 'pending'),
      isNull(resetTokens.claimedAt),
      isNull(resetTokens.deliveryFailedAt),
      lt(resetTokens.deliveryAttempts, options.maxAttempts),
      gt(resetTokens.expiresAt, options.now.toISOString()),
    );
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () =>
          reject(
            new StoreUnavailableError(operation, {
              cause: new Error(`query timed out after ${this.queryTimeoutMs}ms`),
            }),
          ),
        this.queryTimeoutMs,
      );
    });

    try {
      return await Promise.race([query(), timeout]);
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError(operation, { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }
}

import { createClient, Client } from '@libsql/client';
import { drizzle, LibSQLDatabase } from 'drizzle-orm/libsql';
import * as schema from '../../src/database/schema';

/**
 * Test-only DatabaseService that uses an in-memory SQLite database.
 * This ensures tests NEVER touch a real database.
 */
export class TestDatabaseService {
  private client: Client;
  public db: LibSQLDatabase<typeof schema>;

  constructor() {
    // :memory: = in-memory SQLite, completely isolated
    this.client = createClient({ url: ':memory:' });
    this.db = drizzle(this.client, { schema });
  }

  /**
   * Create tables matching the Drizzle schema.
   * Called once before tests start.
   */
  async setupSchema() {
    await this.client.executeMultiple(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        email TEXT NOT NULL UNIQUE,
        hashed_password TEXT NOT NULL,
        telegram_chat_id TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reset_tokens (
        id TEXT PRIMARY KEY,
        account_ref TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        state TEXT NOT NULL DEFAULT 'pending',
        channel TEXT NOT NULL,
        recipient TEXT NOT NULL,
        delivery_attempts INTEGER NOT NULL DEFAULT 0,
        claimed_at TEXT,
        last_delivery_error TEXT,
        delivery_failed_at TEXT,
        created_at TEXT NOT NULL,
        expires_at TEXT NOT NULL,
        delivered_at TEXT,
        consumed_at TEXT
      );

      CREATE INDEX IF NOT EXISTS reset_tokens_account_state_idx
        ON reset_tokens (account_ref, state);
      CREATE INDEX IF NOT EXISTS reset_tokens_state_created_idx
        ON reset_tokens (state, created_at);
      CREATE UNIQUE INDEX IF NOT EXISTS reset_tokens_one_active_per_account
        ON reset_tokens (account_ref) WHERE state IN ('pending', 'delivered');
    `);
  }

  /**
   * Clear all data between tests
   */
  async clearDatabase() {
    await this.client.executeMultiple(`
      DELETE FROM reset_tokens;
      DELETE FROM users;
    `);
  }

  /**
   * Close the database connection.
   * Called in afterAll() of tests.
   */
  close() {
    this.client.close();
  }
}

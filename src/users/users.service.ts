import { Injectable, NotFoundException } from '@nestjs/common';
import { eq } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import { DatabaseService } from '../database/database.service';
import { users } from '../database/schema';

export type User = typeof users.$inferSelect;

/**
 * Account and credential store. The reset flow only reads accounts and
 * replaces password hashes.
 */
@Injectable()
export class UsersService {
  constructor(private readonly databaseService: DatabaseService) {}

  private normalizeEmail(email: string): string {
    return email.toLowerCase().trim();
  }

  async create(
    email: string,
    hashedPassword: string,
    telegramChatId: string | null = null,
  ): Promise<User> {
    const now = new Date().toISOString();

    const [user] = await this.databaseService.db
      .insert(users)
      .values({
        id: uuidv4(),
        email: this.normalizeEmail(email),
        hashedPassword,
        telegramChatId,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    return user;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const normalizedEmail = this.normalizeEmail(email);
    return this.databaseService.db.query.users.findFirst({
      where: eq(users.email, normalizedEmail),
    });
  }

  async findById(id: string): Promise<User | undefined> {
    return this.databaseService.db.query.users.findFirst({
      where: eq(users.id, id),
    });
  }

  async updatePassword(id: string, hashedPassword: string): Promise<void> {
    const updated = await this.databaseService.db
      .update(users)
      .set({ hashedPassword, updatedAt: new Date().toISOString() })
      .where(eq(users.id, id))
      .returning({ id: users.id });

    if (updated.length === 0) {
      throw new NotFoundException('Account not found');
    }
  }
}

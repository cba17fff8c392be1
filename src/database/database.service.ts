import { Injectable, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createClient, Client } from '@libsql/client';
import { drizzle, LibSQLDatabase } from 'drizzle-orm/libsql';
import * as schema from './schema';

export type Database = LibSQLDatabase<typeof schema>;

@Injectable()
export class DatabaseService implements OnApplicationShutdown {
  private client: Client;
  public db: Database;

  constructor(private configService: ConfigService) {
    this.client = createClient({
      url: this.configService.getOrThrow<string>('database.url'),
      authToken: this.configService.get<string>('database.authToken'),
    });
    this.db = drizzle(this.client, { schema });
  }

  // after the worker loops have drained in beforeApplicationShutdown
  onApplicationShutdown() {
    this.client.close();
  }
}

import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import configuration from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { UsersModule } from './users/users.module';
import { PasswordResetModule } from './password-reset/password-reset.module';
import { HealthModule } from './health/health.module';
import { StoreUnavailableFilter } from './common/filters/store-unavailable.filter';

/** Web process: the HTTP API. Delivery happens in the worker (see WorkerModule). */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
    }),
    ThrottlerModule.forRoot([
      {
        ttl: 60000, // 60 seconds
        limit: 100, // Default limit for all routes
      },
    ]),
    DatabaseModule,
    UsersModule,
    PasswordResetModule,
    HealthModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: StoreUnavailableFilter,
    },
    // Conditionally register ThrottlerGuard - disabled in test environment
    ...(process.env.NODE_ENV !== 'test'
      ? [
        {
          provide: APP_GUARD,
          useClass: ThrottlerGuard,
        },
      ]
      : []),
  ],
})
export class AppModule { }

import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { ResetTokensModule } from '../reset-tokens/reset-tokens.module';
import { HealthController } from './health.controller';
import { TokenStoreHealthIndicator } from './token-store.health';

@Module({
  imports: [TerminusModule, ResetTokensModule],
  controllers: [HealthController],
  providers: [TokenStoreHealthIndicator],
})
export class HealthModule { }

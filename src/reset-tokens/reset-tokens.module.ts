import { Module } from '@nestjs/common';
import { DatabaseModule } from '../database/database.module';
import { ResetTokensRepository } from './reset-tokens.repository';
import { TokenIssuerService } from './token-issuer.service';
import { RedemptionService } from './redemption.service';

@Module({
  imports: [DatabaseModule],
  providers: [ResetTokensRepository, TokenIssuerService, RedemptionService],
  exports: [ResetTokensRepository, TokenIssuerService, RedemptionService],
})
export class ResetTokensModule { }

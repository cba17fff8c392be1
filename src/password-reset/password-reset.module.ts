import { Module } from '@nestjs/common';
import { UsersModule } from '../users/users.module';
import { ResetTokensModule } from '../reset-tokens/reset-tokens.module';
import { PasswordResetController } from './password-reset.controller';
import { PasswordResetService } from './password-reset.service';

@Module({
  imports: [UsersModule, ResetTokensModule],
  controllers: [PasswordResetController],
  providers: [PasswordResetService],
  exports: [PasswordResetService],
})
export class PasswordResetModule { }

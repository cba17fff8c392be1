import { IsString, Matches } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';
import { RESET_TOKEN_PATTERN } from './reset-password.dto';

export class VerifyResetTokenDto {
  @ApiProperty({ description: 'Token from the reset link' })
  @IsString()
  @Matches(RESET_TOKEN_PATTERN, { message: 'Malformed reset token' })
  token!: string;
}

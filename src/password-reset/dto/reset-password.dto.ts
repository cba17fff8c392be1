import { IsString, Matches, MinLength, MaxLength } from 'class-validator';
import { ApiProperty } from '@nestjs/swagger';

// 32 random bytes, base64url without padding
export const RESET_TOKEN_PATTERN = /^[A-Za-z0-9_-]{43}$/;

export class ResetPasswordDto {
  @ApiProperty({ description: 'Token from the reset link' })
  @IsString()
  @Matches(RESET_TOKEN_PATTERN, { message: 'Malformed reset token' })
  token!: string;

  @ApiProperty()
  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters' })
  @MaxLength(72, { message: 'Password cannot exceed 72 characters' }) // bcrypt limit
  password!: string;
}

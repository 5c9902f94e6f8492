/**
 * Refresh Token DTO
 * Also the logout body
 */

import { IsString, IsNotEmpty } from 'class-validator';

export class RefreshDto {
  @IsString()
  @IsNotEmpty()
  refresh_token!: string;
}

export class RefreshResponseDto {
  access_token!: string;
  refresh_token!: string; // the presented token, unchanged
  token_type!: 'Bearer';
  expires_in!: number; // seconds
}

/**
 * Login DTO
 * Exactly one of email or tax_id identifies the principal
 */

import { IsEmail, IsNotEmpty, IsString, Length, ValidateIf } from 'class-validator';
import { PrincipalDto } from './principal.dto';

export class LoginDto {
  @ValidateIf((dto: LoginDto) => dto.email !== undefined || dto.tax_id === undefined)
  @IsEmail()
  email?: string;

  @ValidateIf((dto: LoginDto) => dto.tax_id !== undefined || dto.email === undefined)
  @IsString()
  @Length(4, 32)
  tax_id?: string;

  @IsString()
  @IsNotEmpty()
  password!: string;
}

export class LoginResponseDto {
  access_token!: string;
  refresh_token!: string;
  token_type!: 'Bearer';
  expires_in!: number; // seconds
  principal!: PrincipalDto;
}

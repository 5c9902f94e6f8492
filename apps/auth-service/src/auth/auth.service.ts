/**
 * Auth Service
 * Login, refresh and logout on top of the credential validator,
 * the token issuer and the session store
 */

import { Injectable, Logger } from '@nestjs/common';
import { AccessTokenClaims, JwtService } from '@tollgate/common/jwt';
import { ERRORS } from '@tollgate/common/errors';
import { toPrincipalSummary } from '@tollgate/common/types';
import { CredentialValidatorService } from '../credentials/credential-validator.service';
import { PrincipalRepository } from '../credentials/principal.repository';
import { SessionStoreService } from '../sessions/session-store.service';
import { LoginDto, LoginResponseDto } from './dto/login.dto';
import { RefreshDto, RefreshResponseDto } from './dto/refresh.dto';
import { MeResponseDto, toPrincipalDto } from './dto/principal.dto';

@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly credentials: CredentialValidatorService,
    private readonly sessions: SessionStoreService,
    private readonly principals: PrincipalRepository,
    private readonly jwtService: JwtService,
  ) {}

  /**
   * Exchange credentials for an access token and a refresh token.
   * A new login replaces any earlier refresh token of the principal.
   */
  async login(dto: LoginDto, origin: string): Promise<LoginResponseDto> {
    if (dto.email !== undefined && dto.tax_id !== undefined) {
      throw ERRORS.ValidationError('Provide either email or tax_id, not both');
    }
    const identifier = dto.email ?? dto.tax_id;
    if (identifier === undefined) {
      throw ERRORS.ValidationError('Provide email or tax_id');
    }

    const check = await this.credentials.validate(identifier, dto.password, origin);
    if (!check.valid) {
      throw ERRORS.InvalidCredentials();
    }

    const { principal } = check;
    const accessToken = this.jwtService.createAccessToken(principal.id);
    const { token: refreshToken } = await this.sessions.create(principal.id);

    this.logger.log(`Login succeeded for principal ${principal.id}`);

    return {
      access_token: accessToken,
      refresh_token: refreshToken,
      token_type: 'Bearer',
      expires_in: this.jwtService.accessTokenTtl,
      principal: toPrincipalDto(principal),
    };
  }

  /**
   * Issue a new access token for a live refresh token.
   * The refresh token itself stays valid until its own expiry.
   */
  async refresh(dto: RefreshDto): Promise<RefreshResponseDto> {
    const record = await this.sessions.validate(dto.refresh_token);

    return {
      access_token: this.jwtService.createAccessToken(record.principalId),
      refresh_token: dto.refresh_token,
      token_type: 'Bearer',
      expires_in: this.jwtService.accessTokenTtl,
    };
  }

  async logout(refreshToken: string): Promise<void> {
    await this.sessions.revoke(refreshToken);
  }

  /**
   * Principal behind a verified access token
   */
  async me(claims: AccessTokenClaims): Promise<MeResponseDto> {
    const principal = await this.principals.findById(claims.sub);
    if (!principal) {
      this.logger.warn(`Access token for unknown principal ${claims.sub}`);
      throw ERRORS.TokenInvalid();
    }

    return {
      ...toPrincipalDto(toPrincipalSummary(principal)),
      expires_at: new Date(claims.exp * 1000).toISOString(),
    };
  }
}

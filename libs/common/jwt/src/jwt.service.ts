/**
 * Tollgate JWT Service
 * Token Issuer: short-lived RS256 access tokens
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { JwtService as NestJwtService } from '@nestjs/jwt';
import { v4 as uuidv4 } from 'uuid';
import { ERRORS, describeError } from '@tollgate/common/errors';
import { Clock, CLOCK } from '@tollgate/common/types';
import { AccessTokenClaims } from './jwt.types';

@Injectable()
export class JwtService {
  private readonly logger = new Logger(JwtService.name);
  private readonly issuer: string;
  readonly accessTokenTtl: number;

  constructor(
    private nestJwtService: NestJwtService,
    configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    this.issuer = configService.get<string>('jwt.issuer') || 'tollgate';
    this.accessTokenTtl = configService.get<number>('accessTokenTtlSeconds') ?? 900;

    if (!Number.isInteger(this.accessTokenTtl) || this.accessTokenTtl <= 0) {
      throw new Error(`Invalid access token TTL: ${this.accessTokenTtl}`);
    }
  }

  /**
   * Create access token for a principal
   */
  createAccessToken(principalId: string): string {
    const now = this.nowSeconds();
    const claims: AccessTokenClaims = {
      sub: principalId,
      iss: this.issuer,
      jti: uuidv4(),
      iat: now,
      exp: now + this.accessTokenTtl,
    };

    return this.nestJwtService.sign({ ...claims });
  }

  /**
   * Verify signature (public key only), algorithm, issuer and expiry against the injected clock
   * Throws TokenInvalid on any failure
   */
  verifyAccessToken(token: string): AccessTokenClaims {
    let payload: unknown;
    try {
      payload = this.nestJwtService.verify(token, {
        issuer: this.issuer,
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      this.logger.warn(`JWT verification failed: ${describeError(error)}`);
      throw ERRORS.TokenInvalid(error);
    }

    if (!isAccessTokenClaims(payload)) {
      this.logger.warn('JWT payload validation failed: invalid structure');
      throw ERRORS.TokenInvalid();
    }

    return payload;
  }

  private nowSeconds(): number {
    return Math.floor(this.clock.now() / 1000);
  }
}

function isAccessTokenClaims(payload: unknown): payload is AccessTokenClaims {
  return (
    typeof payload === 'object' &&
    payload !== null &&
    'sub' in payload &&
    typeof payload.sub === 'string' &&
    payload.sub.length > 0 &&
    'iss' in payload &&
    typeof payload.iss === 'string' &&
    'jti' in payload &&
    typeof payload.jti === 'string' &&
    'iat' in payload &&
    typeof payload.iat === 'number' &&
    'exp' in payload &&
    typeof payload.exp === 'number'
  );
}

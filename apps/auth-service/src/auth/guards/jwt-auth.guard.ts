/**
 * JWT Auth Guard
 * Fail-closed: any verification problem denies the request
 */

import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Request } from 'express';
import { AccessTokenClaims, JwtService } from '@tollgate/common/jwt';
import { ERRORS } from '@tollgate/common/errors';

export interface AuthenticatedRequest extends Request {
  user?: AccessTokenClaims;
}

@Injectable()
export class JwtAuthGuard implements CanActivate {
  constructor(private readonly jwtService: JwtService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const token = this.extractTokenFromHeader(request);
    if (!token) {
      throw ERRORS.TokenInvalid();
    }

    // Throws TokenInvalid on bad signature, algorithm, issuer or expiry
    request.user = this.jwtService.verifyAccessToken(token);
    return true;
  }

  /**
   * Extract Bearer token from Authorization header
   */
  private extractTokenFromHeader(request: Request): string | null {
    const authHeader = request.headers.authorization;
    if (!authHeader) {
      return null;
    }

    const [type, token] = authHeader.split(' ');
    if (type !== 'Bearer' || !token) {
      return null;
    }

    return token;
  }
}

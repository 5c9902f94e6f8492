import { ExecutionContext } from '@nestjs/common';
import { ErrorCode, isTollgateError } from '@tollgate/common/errors';
import { createTestJwtService } from '../../../../../test/support/jwt';
import { AuthenticatedRequest, JwtAuthGuard } from './jwt-auth.guard';

describe('JwtAuthGuard', () => {
  const jwtService = createTestJwtService();
  const guard = new JwtAuthGuard(jwtService);

  function contextFor(authorization?: string) {
    const request: Partial<AuthenticatedRequest> = {
      headers: authorization === undefined ? {} : { authorization },
    };
    const context = {
      switchToHttp: () => ({ getRequest: () => request }),
    } as unknown as ExecutionContext;
    return { context, request };
  }

  function denial(authorization?: string): unknown {
    try {
      guard.canActivate(contextFor(authorization).context);
    } catch (error) {
      return error;
    }
    return undefined;
  }

  it('should attach verified claims to the request', () => {
    const { context, request } = contextFor(`Bearer ${jwtService.createAccessToken('principal-1')}`);

    expect(guard.canActivate(context)).toBe(true);
    expect(request.user?.sub).toBe('principal-1');
  });

  it('should deny a missing header', () => {
    expect(isTollgateError(denial(), ErrorCode.TokenInvalid)).toBe(true);
  });

  it('should deny a non-Bearer scheme', () => {
    expect(isTollgateError(denial('Basic dGVzdDp0ZXN0'), ErrorCode.TokenInvalid)).toBe(true);
  });

  it('should deny a token from another key pair', () => {
    const foreign = createTestJwtService().createAccessToken('principal-1');

    expect(isTollgateError(denial(`Bearer ${foreign}`), ErrorCode.TokenInvalid)).toBe(true);
  });
});

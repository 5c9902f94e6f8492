/**
 * Session Store
 * Refresh token lifecycle: at most one live token per principal
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { TokenHashService } from '@tollgate/common/crypto';
import { ERRORS } from '@tollgate/common/errors';
import { Clock, CLOCK, RefreshTokenRecord } from '@tollgate/common/types';
import { KeyedMutex } from './keyed-mutex';
import { RefreshTokenRepository } from './refresh-token.repository';

export interface IssuedRefreshToken {
  /** Opaque value handed to the client; only its hash is stored */
  token: string;
  record: RefreshTokenRecord;
}

@Injectable()
export class SessionStoreService {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly principalLocks = new KeyedMutex();
  readonly refreshTokenTtl: number;

  constructor(
    private readonly repository: RefreshTokenRepository,
    private readonly tokenHashService: TokenHashService,
    configService: ConfigService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {
    const ttl = configService.get<number>('refreshTokenTtlSeconds');
    if (ttl === undefined || !Number.isInteger(ttl) || ttl < 1) {
      throw new Error(`Invalid refreshTokenTtlSeconds: ${String(ttl)}`);
    }
    this.refreshTokenTtl = ttl;
  }

  /**
   * Issue a new refresh token for the principal, superseding any earlier one
   */
  async create(principalId: string): Promise<IssuedRefreshToken> {
    return this.principalLocks.runExclusive(principalId, async () => {
      const token = this.tokenHashService.generateToken();
      const now = this.clock.now();
      const record: RefreshTokenRecord = {
        id: uuidv4(),
        principalId,
        tokenHash: this.tokenHashService.hash(token),
        expiresAt: new Date(now + this.refreshTokenTtl * 1000),
        createdAt: new Date(now),
      };

      await this.repository.replaceForPrincipal(record);
      this.logger.log(`Refresh token issued for principal ${principalId}`);

      return { token, record };
    });
  }

  /**
   * Resolve a presented refresh token to its live record.
   * Unknown and expired tokens fail the same way for the caller.
   */
  async validate(token: string): Promise<RefreshTokenRecord> {
    const record = await this.repository.findByTokenHash(this.tokenHashService.hash(token));

    if (!record) {
      this.logger.warn('Refresh token rejected: not found');
      throw ERRORS.SessionInvalid('NotFound');
    }

    if (record.expiresAt.getTime() <= this.clock.now()) {
      this.logger.warn(`Refresh token rejected: expired for principal ${record.principalId}`);
      throw ERRORS.SessionInvalid('Expired');
    }

    return record;
  }

  /**
   * Forget the token. Unknown tokens are ignored.
   */
  async revoke(token: string): Promise<void> {
    const removed = await this.repository.deleteByTokenHash(this.tokenHashService.hash(token));
    if (removed) {
      this.logger.log('Refresh token revoked');
    }
  }
}

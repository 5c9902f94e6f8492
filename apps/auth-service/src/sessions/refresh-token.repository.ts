/**
 * Refresh token persistence port
 */

import { RefreshTokenRecord } from '@tollgate/common/types';

export abstract class RefreshTokenRepository {
  /**
   * Remove every record of record.principalId and store `record`, as one
   * atomic unit. Callers for the same principal are serialized.
   */
  abstract replaceForPrincipal(record: RefreshTokenRecord): Promise<void>;

  abstract findByTokenHash(tokenHash: string): Promise<RefreshTokenRecord | null>;

  /** Returns whether a record was removed */
  abstract deleteByTokenHash(tokenHash: string): Promise<boolean>;
}

/**
 * PostgreSQL refresh token repository
 * Table: auth.refresh_tokens (one row per principal, enforced by a unique index)
 */

import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '@tollgate/common/database';
import { describeError, ERRORS, isTollgateError } from '@tollgate/common/errors';
import { RefreshTokenRecord } from '@tollgate/common/types';
import { RefreshTokenRepository } from './refresh-token.repository';

interface RefreshTokenRow {
  id: string;
  principal_id: string;
  token_hash: string;
  expires_at: Date;
  created_at: Date;
}

function toRecord(row: RefreshTokenRow): RefreshTokenRecord {
  return {
    id: row.id,
    principalId: row.principal_id,
    tokenHash: row.token_hash,
    expiresAt: row.expires_at,
    createdAt: row.created_at,
  };
}

@Injectable()
export class PgRefreshTokenRepository extends RefreshTokenRepository {
  private readonly logger = new Logger(PgRefreshTokenRepository.name);

  constructor(private readonly db: DatabaseService) {
    super();
  }

  async replaceForPrincipal(record: RefreshTokenRecord): Promise<void> {
    await this.run('refresh_tokens.replace', () =>
      this.db.transaction(async (client) => {
        // Serializes concurrent replacements for one principal across processes
        await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [record.principalId]);
        await client.query('DELETE FROM auth.refresh_tokens WHERE principal_id = $1', [
          record.principalId,
        ]);
        await client.query(
          `INSERT INTO auth.refresh_tokens (id, principal_id, token_hash, expires_at, created_at)
           VALUES ($1, $2, $3, $4, $5)`,
          [record.id, record.principalId, record.tokenHash, record.expiresAt, record.createdAt],
        );
      }),
    );
  }

  async findByTokenHash(tokenHash: string): Promise<RefreshTokenRecord | null> {
    const row = await this.run('refresh_tokens.find', () =>
      this.db.queryOne<RefreshTokenRow>(
        `SELECT id, principal_id, token_hash, expires_at, created_at
         FROM auth.refresh_tokens
         WHERE token_hash = $1`,
        [tokenHash],
      ),
    );
    return row ? toRecord(row) : null;
  }

  async deleteByTokenHash(tokenHash: string): Promise<boolean> {
    const result = await this.run('refresh_tokens.delete', () =>
      this.db.query('DELETE FROM auth.refresh_tokens WHERE token_hash = $1', [tokenHash]),
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isTollgateError(error)) {
        throw error;
      }
      this.logger.error(`${operation} failed: ${describeError(error)}`);
      throw ERRORS.PersistenceUnavailable(operation, error);
    }
  }
}

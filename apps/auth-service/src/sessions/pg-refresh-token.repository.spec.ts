import { PoolClient } from 'pg';
import { DatabaseService } from '@tollgate/common/database';
import { ErrorCode, isTollgateError } from '@tollgate/common/errors';
import { PgRefreshTokenRepository } from './pg-refresh-token.repository';

describe('PgRefreshTokenRepository', () => {
  const record = {
    id: 'token-id',
    principalId: 'principal-1',
    tokenHash: 'hash-1',
    expiresAt: new Date('2024-01-16T00:00:00Z'),
    createdAt: new Date('2024-01-01T00:00:00Z'),
  };

  function createDb() {
    const client = { query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }) };
    const db = {
      query: jest.fn(),
      queryOne: jest.fn(),
      transaction: jest.fn((fn: (c: PoolClient) => Promise<unknown>) =>
        fn(client as unknown as PoolClient),
      ),
    };
    return { db, client, repository: new PgRefreshTokenRepository(db as unknown as DatabaseService) };
  }

  it('should lock, delete and insert inside one transaction', async () => {
    const { db, client, repository } = createDb();

    await repository.replaceForPrincipal(record);

    expect(db.transaction).toHaveBeenCalledTimes(1);
    expect(client.query.mock.calls).toEqual([
      ['SELECT pg_advisory_xact_lock(hashtext($1))', ['principal-1']],
      ['DELETE FROM auth.refresh_tokens WHERE principal_id = $1', ['principal-1']],
      [
        expect.stringContaining('INSERT INTO auth.refresh_tokens'),
        ['token-id', 'principal-1', 'hash-1', record.expiresAt, record.createdAt],
      ],
    ]);
  });

  it('should map rows to records', async () => {
    const { db, repository } = createDb();
    db.queryOne.mockResolvedValue({
      id: 'token-id',
      principal_id: 'principal-1',
      token_hash: 'hash-1',
      expires_at: record.expiresAt,
      created_at: record.createdAt,
    });

    await expect(repository.findByTokenHash('hash-1')).resolves.toEqual(record);
    expect(db.queryOne).toHaveBeenCalledWith(expect.stringContaining('WHERE token_hash = $1'), [
      'hash-1',
    ]);
  });

  it('should return null for an unknown hash', async () => {
    const { db, repository } = createDb();
    db.queryOne.mockResolvedValue(null);

    await expect(repository.findByTokenHash('missing')).resolves.toBeNull();
  });

  it('should report whether a delete removed anything', async () => {
    const { db, repository } = createDb();
    db.query.mockResolvedValueOnce({ rows: [], rowCount: 1 });
    db.query.mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(repository.deleteByTokenHash('hash-1')).resolves.toBe(true);
    await expect(repository.deleteByTokenHash('hash-1')).resolves.toBe(false);
  });

  it('should turn driver errors into PersistenceUnavailable', async () => {
    const { db, repository } = createDb();
    db.queryOne.mockRejectedValue(new Error('Query read timeout'));

    const error = await repository.findByTokenHash('hash-1').catch((e: unknown) => e);

    expect(isTollgateError(error, ErrorCode.PersistenceUnavailable)).toBe(true);
  });
});

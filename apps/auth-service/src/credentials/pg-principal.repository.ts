/**
 * PostgreSQL principal directory
 * Table: auth.users
 */

import { Injectable, Logger } from '@nestjs/common';
import { DatabaseService } from '@tollgate/common/database';
import { describeError, ERRORS } from '@tollgate/common/errors';
import { Principal } from '@tollgate/common/types';
import { PrincipalRepository } from './principal.repository';

interface UserRow {
  id: string;
  email: string | null;
  tax_id: string | null;
  display_name: string | null;
  password_hash: string;
}

const USER_COLUMNS = 'id, email, tax_id, display_name, password_hash';

function toPrincipal(row: UserRow): Principal {
  return {
    id: row.id,
    email: row.email,
    taxId: row.tax_id,
    displayName: row.display_name,
    passwordHash: row.password_hash,
  };
}

@Injectable()
export class PgPrincipalRepository extends PrincipalRepository {
  private readonly logger = new Logger(PgPrincipalRepository.name);

  constructor(private readonly db: DatabaseService) {
    super();
  }

  async findByIdentifier(identifier: string): Promise<Principal | null> {
    const trimmed = identifier.trim();
    const sql = trimmed.includes('@')
      ? `SELECT ${USER_COLUMNS} FROM auth.users WHERE lower(email) = lower($1)`
      : `SELECT ${USER_COLUMNS} FROM auth.users WHERE tax_id = $1`;

    return this.findOne('users.find_by_identifier', sql, trimmed);
  }

  async findById(id: string): Promise<Principal | null> {
    return this.findOne(
      'users.find_by_id',
      `SELECT ${USER_COLUMNS} FROM auth.users WHERE id = $1`,
      id,
    );
  }

  private async findOne(operation: string, sql: string, param: string): Promise<Principal | null> {
    try {
      const row = await this.db.queryOne<UserRow>(sql, [param]);
      return row ? toPrincipal(row) : null;
    } catch (error) {
      this.logger.error(`${operation} failed: ${describeError(error)}`);
      throw ERRORS.PersistenceUnavailable(operation, error);
    }
  }
}

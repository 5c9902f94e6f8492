/**
 * Tollgate Password Service
 * Argon2id password hashing
 */

import { Injectable, Logger } from '@nestjs/common';
import * as argon2 from 'argon2';
import { randomBytes } from 'crypto';
import { describeError } from '@tollgate/common/errors';

@Injectable()
export class PasswordService {
  private readonly logger = new Logger(PasswordService.name);
  private dummyHash?: Promise<string>;

  /**
   * Hash password using Argon2id
   * - time_cost: 2
   * - memory_cost: 65536 (64 MB)
   * - parallelism: 1
   * - hash_length: 32
   * - salt: 16 random bytes (library default)
   */
  async hash(password: string): Promise<string> {
    try {
      return await argon2.hash(password, {
        type: argon2.argon2id,
        timeCost: 2,
        memoryCost: 65536, // 64 MB
        parallelism: 1,
        hashLength: 32,
      });
    } catch (error) {
      this.logger.error(`Password hashing failed: ${describeError(error)}`);
      throw new Error('Password hashing failed');
    }
  }

  /**
   * Verify password against an Argon2 hash (constant-time compare)
   * A malformed stored hash counts as a mismatch.
   */
  async verify(hash: string, password: string): Promise<boolean> {
    try {
      return await argon2.verify(hash, password);
    } catch (error) {
      this.logger.error(`Password verification failed: ${describeError(error)}`);
      return false;
    }
  }

  /**
   * Spend the same work as verify() when there is no stored hash,
   * so unknown identifiers answer as slowly as wrong passwords.
   */
  async verifyDummy(password: string): Promise<false> {
    if (!this.dummyHash) {
      this.dummyHash = this.hash(randomBytes(16).toString('hex'));
    }
    await this.verify(await this.dummyHash, password);
    return false;
  }
}

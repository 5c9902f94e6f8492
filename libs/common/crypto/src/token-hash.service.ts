/**
 * Tollgate Token Hash Service
 * SHA-256 hashing for opaque tokens at rest
 */

import { Injectable } from '@nestjs/common';
import * as crypto from 'crypto';

@Injectable()
export class TokenHashService {
  /**
   * Hash token using SHA-256
   * Refresh tokens are stored and looked up by this digest only
   */
  hash(token: string): string {
    return crypto.createHash('sha256').update(token).digest('hex');
  }

  /**
   * Generate random token (32 bytes, base64url encoded)
   */
  generateToken(): string {
    return crypto.randomBytes(32).toString('base64url');
  }
}

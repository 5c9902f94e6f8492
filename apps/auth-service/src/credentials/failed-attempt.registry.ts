/**
 * Failed login bookkeeping per identifier.
 * In memory only; an audit signal, never a lockout.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Clock, CLOCK } from '@tollgate/common/types';
import { maskIdentifier, normalizeIdentifier } from './mask';

export type FailureReason = 'NotFound' | 'Mismatch';

export interface FailedAttemptRecord {
  attempts: number;
  lastAttemptAt: Date;
  lastReason: FailureReason;
  lastOrigin: string;
}

@Injectable()
export class FailedAttemptRegistry {
  private readonly logger = new Logger(FailedAttemptRegistry.name);
  // Ordered by last attempt: updated keys are re-inserted
  private readonly records = new Map<string, FailedAttemptRecord>();
  private readonly maxEntries: number;

  constructor(configService: ConfigService, @Inject(CLOCK) private readonly clock: Clock) {
    const maxEntries = configService.get<number>('failedAttempts.maxEntries') ?? 10000;
    if (!Number.isInteger(maxEntries) || maxEntries < 1) {
      throw new Error(`Invalid failedAttempts.maxEntries: ${maxEntries}`);
    }
    this.maxEntries = maxEntries;
  }

  record(identifier: string, reason: FailureReason, origin: string): FailedAttemptRecord {
    const key = normalizeIdentifier(identifier);
    const previous = this.records.get(key);
    this.records.delete(key);

    const next: FailedAttemptRecord = {
      attempts: (previous?.attempts ?? 0) + 1,
      lastAttemptAt: new Date(this.clock.now()),
      lastReason: reason,
      lastOrigin: origin,
    };
    this.records.set(key, next);

    while (this.records.size > this.maxEntries) {
      const oldest = this.records.keys().next();
      if (oldest.done) {
        break;
      }
      this.records.delete(oldest.value);
    }

    this.logger.debug(`Failed attempt ${next.attempts} for ${maskIdentifier(key)}: ${reason}`);
    return next;
  }

  /** Forget the identifier; returns the record that was cleared, if any */
  clear(identifier: string): FailedAttemptRecord | undefined {
    const key = normalizeIdentifier(identifier);
    const removed = this.records.get(key);
    if (removed) {
      this.records.delete(key);
      this.logger.debug(
        `Cleared ${removed.attempts} failed attempts for ${maskIdentifier(key)}`,
      );
    }
    return removed;
  }

  get(identifier: string): FailedAttemptRecord | undefined {
    return this.records.get(normalizeIdentifier(identifier));
  }

  get size(): number {
    return this.records.size;
  }
}

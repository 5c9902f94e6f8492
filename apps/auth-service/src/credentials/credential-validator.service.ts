/**
 * Credential Validator
 * Checks an identifier and password against the principal directory
 */

import { Injectable, Logger } from '@nestjs/common';
import { PasswordService } from '@tollgate/common/crypto';
import { describeError } from '@tollgate/common/errors';
import { PrincipalSummary, toPrincipalSummary } from '@tollgate/common/types';
import { AuditLogger } from './audit-logger.service';
import { FailedAttemptRecord, FailedAttemptRegistry, FailureReason } from './failed-attempt.registry';
import { PrincipalRepository } from './principal.repository';

export type CredentialCheck = { valid: true; principal: PrincipalSummary } | { valid: false };

@Injectable()
export class CredentialValidatorService {
  private readonly logger = new Logger(CredentialValidatorService.name);
  private droppedEvents = 0;

  constructor(
    private readonly principals: PrincipalRepository,
    private readonly passwordService: PasswordService,
    private readonly failedAttempts: FailedAttemptRegistry,
    private readonly audit: AuditLogger,
  ) {}

  /**
   * Both failure paths answer { valid: false } with no hint of which one
   * happened. A directory failure propagates as PersistenceUnavailable.
   */
  async validate(identifier: string, password: string, origin: string): Promise<CredentialCheck> {
    this.bookkeep(() => this.audit.loginStarted(identifier, origin));

    const principal = await this.principals.findByIdentifier(identifier);

    if (!principal) {
      await this.passwordService.verifyDummy(password);
      this.recordFailure(identifier, 'NotFound', origin);
      return { valid: false };
    }

    const matches = await this.passwordService.verify(principal.passwordHash, password);
    if (!matches) {
      this.logger.warn(`Password mismatch for principal ${principal.id}`);
      this.recordFailure(identifier, 'Mismatch', origin);
      return { valid: false };
    }

    const summary = toPrincipalSummary(principal);
    this.bookkeep(() => {
      this.failedAttempts.clear(identifier);
      this.audit.loginSucceeded(summary, origin);
    });

    return { valid: true, principal: summary };
  }

  getFailedAttempts(identifier: string): FailedAttemptRecord | undefined {
    return this.failedAttempts.get(identifier);
  }

  /** Audit events lost to bookkeeping errors since startup */
  get droppedEventCount(): number {
    return this.droppedEvents;
  }

  private recordFailure(identifier: string, reason: FailureReason, origin: string): void {
    this.bookkeep(() => {
      const record = this.failedAttempts.record(identifier, reason, origin);
      this.audit.loginFailed(identifier, reason, origin, record.attempts);
    });
  }

  private bookkeep(fn: () => void): void {
    try {
      fn();
    } catch (error) {
      this.droppedEvents++;
      this.logger.error(`Audit bookkeeping failed: ${describeError(error)}`);
    }
  }
}

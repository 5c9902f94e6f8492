/**
 * Audit Logger
 *
 * Structured single-line JSON entries for login activity. Identifiers are
 * masked before they reach the log; principal ids are logged as is.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import { Clock, CLOCK, PrincipalSummary } from '@tollgate/common/types';
import { maskEmail, maskIdentifier, maskTaxId } from './mask';
import { FailureReason } from './failed-attempt.registry';

export type AuditAction = 'LOGIN_STARTED' | 'LOGIN_SUCCESS' | 'LOGIN_FAILURE';

export interface AuditEntry {
  action: AuditAction;
  timestamp: string;
  ip: string;
  identifier?: string;
  principalId?: string;
  email?: string;
  taxId?: string;
  reason?: FailureReason;
  attempts?: number;
}

@Injectable()
export class AuditLogger {
  private readonly logger = new Logger('Audit');

  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  loginStarted(identifier: string, ip: string): void {
    this.write({ action: 'LOGIN_STARTED', ip, identifier: maskIdentifier(identifier) });
  }

  loginSucceeded(principal: PrincipalSummary, ip: string): void {
    this.write({
      action: 'LOGIN_SUCCESS',
      ip,
      principalId: principal.id,
      email: principal.email ? maskEmail(principal.email) : undefined,
      taxId: principal.taxId ? maskTaxId(principal.taxId) : undefined,
    });
  }

  loginFailed(identifier: string, reason: FailureReason, ip: string, attempts: number): void {
    this.write({
      action: 'LOGIN_FAILURE',
      ip,
      identifier: maskIdentifier(identifier),
      reason,
      attempts,
    });
  }

  private write(entry: Omit<AuditEntry, 'timestamp'>): void {
    const line: AuditEntry = {
      ...entry,
      timestamp: new Date(this.clock.now()).toISOString(),
    };
    const json = JSON.stringify(line);

    if (entry.action === 'LOGIN_FAILURE') {
      this.logger.warn(json);
    } else {
      this.logger.log(json);
    }
  }
}

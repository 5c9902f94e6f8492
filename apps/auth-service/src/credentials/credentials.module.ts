import { Module } from '@nestjs/common';
import { CryptoModule } from '@tollgate/common/crypto';
import { DatabaseModule } from '@tollgate/common/database';
import { CLOCK, systemClock } from '@tollgate/common/types';
import { AuditLogger } from './audit-logger.service';
import { CredentialValidatorService } from './credential-validator.service';
import { FailedAttemptRegistry } from './failed-attempt.registry';
import { PgPrincipalRepository } from './pg-principal.repository';
import { PrincipalRepository } from './principal.repository';

@Module({
  imports: [CryptoModule, DatabaseModule],
  providers: [
    CredentialValidatorService,
    FailedAttemptRegistry,
    AuditLogger,
    { provide: PrincipalRepository, useClass: PgPrincipalRepository },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [CredentialValidatorService, PrincipalRepository],
})
export class CredentialsModule {}

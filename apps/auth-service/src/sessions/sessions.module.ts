import { Module } from '@nestjs/common';
import { CryptoModule } from '@tollgate/common/crypto';
import { DatabaseModule } from '@tollgate/common/database';
import { CLOCK, systemClock } from '@tollgate/common/types';
import { PgRefreshTokenRepository } from './pg-refresh-token.repository';
import { RefreshTokenRepository } from './refresh-token.repository';
import { SessionStoreService } from './session-store.service';

@Module({
  imports: [CryptoModule, DatabaseModule],
  providers: [
    SessionStoreService,
    { provide: RefreshTokenRepository, useClass: PgRefreshTokenRepository },
    { provide: CLOCK, useValue: systemClock },
  ],
  exports: [SessionStoreService],
})
export class SessionsModule {}

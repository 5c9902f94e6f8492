/**
 * Auth Service Root Module
 */

import { Module } from '@nestjs/common';
import { TollgateConfigModule } from '@tollgate/common/config';
import { AuthModule } from './auth/auth.module';
import { GateModule } from './gate/gate.module';
import { HealthController } from './health.controller';

@Module({
  imports: [
    // Configuration
    TollgateConfigModule,

    // Admission control runs ahead of every route
    GateModule,

    // Feature modules
    AuthModule,
  ],
  controllers: [HealthController],
})
export class AppModule {}

import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { RateLimitModule } from '@tollgate/common/rate-limit';
import { AdmissionGuard } from './admission.guard';
import { RequestGateService } from './request-gate.service';

@Module({
  imports: [RateLimitModule],
  providers: [RequestGateService, { provide: APP_GUARD, useClass: AdmissionGuard }],
  exports: [RequestGateService],
})
export class GateModule {}

/**
 * Tollgate Rate Limit Module
 * Provides the admission controller backed by an in-memory bucket registry
 */

import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { Clock, CLOCK, systemClock } from '@tollgate/common/types';
import { AdmissionControllerService } from './admission-controller.service';
import { BUCKET_STORE } from './bucket-store';
import { InMemoryBucketStore } from './in-memory-bucket-store';
import { resolveRateLimitOptions } from './rate-limit.options';
import { RATE_LIMIT_OPTIONS, RateLimitOptions } from './rate-limit.types';
import { isFull } from './token-bucket';

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: RATE_LIMIT_OPTIONS,
      inject: [ConfigService],
      useFactory: resolveRateLimitOptions,
    },
    { provide: CLOCK, useValue: systemClock },
    {
      provide: BUCKET_STORE,
      inject: [RATE_LIMIT_OPTIONS, CLOCK],
      useFactory: (options: RateLimitOptions, clock: Clock) =>
        new InMemoryBucketStore({
          maxBuckets: options.maxBuckets,
          isReclaimable: (state) => isFull(state, clock.now()),
        }),
    },
    AdmissionControllerService,
  ],
  exports: [AdmissionControllerService, RATE_LIMIT_OPTIONS],
})
export class RateLimitModule {}

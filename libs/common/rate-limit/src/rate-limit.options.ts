/**
 * Resolve and validate admission policies from configuration.
 * Invalid policies stop startup.
 */

import { ConfigService } from '@nestjs/config';
import type { BucketPolicyConfig } from '@tollgate/common/config';
import { RateLimitOptions, RateLimitPolicy, RateLimitPolicyName } from './rate-limit.types';

function positiveInteger(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`Invalid rate limit setting ${field}: ${String(value)}`);
  }
  return value;
}

function toPolicy(name: RateLimitPolicyName, raw: BucketPolicyConfig | undefined): RateLimitPolicy {
  if (!raw) {
    throw new Error(`Missing rate limit policy ${name}`);
  }
  return {
    name,
    capacity: positiveInteger(raw.capacity, `${name}.capacity`),
    refillTokens: positiveInteger(raw.refillTokens, `${name}.refillTokens`),
    refillSeconds: positiveInteger(raw.refillSeconds, `${name}.refillSeconds`),
  };
}

export function resolveRateLimitOptions(config: ConfigService): RateLimitOptions {
  const loginPath = config.get<string>('rateLimit.loginPath');
  if (!loginPath || !loginPath.startsWith('/')) {
    throw new Error(`Invalid rate limit setting loginPath: ${String(loginPath)}`);
  }

  return {
    policies: {
      default: toPolicy('default', config.get<BucketPolicyConfig>('rateLimit.default')),
      loginRoute: toPolicy('loginRoute', config.get<BucketPolicyConfig>('rateLimit.loginRoute')),
    },
    loginPath,
    maxBuckets: positiveInteger(config.get<number>('rateLimit.maxBuckets'), 'maxBuckets'),
  };
}

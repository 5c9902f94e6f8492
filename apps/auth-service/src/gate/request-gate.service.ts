/**
 * Request Gate
 * Maps an incoming request to a rate limit bucket and asks for admission
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AdmissionControllerService,
  RATE_LIMIT_OPTIONS,
  RateLimitOptions,
  RateLimitPolicyName,
} from '@tollgate/common/rate-limit';
import { AddressableRequest, resolveClientAddress } from './client-address';

export interface GateRequest extends AddressableRequest {
  /** Path with or without query string */
  url: string;
}

export type GateDecision =
  | {
      outcome: 'forwarded';
      key: string;
      routeClass: RateLimitPolicyName;
      limit: number;
      remaining: number;
    }
  | {
      outcome: 'rejected';
      key: string;
      routeClass: RateLimitPolicyName;
      limit: number;
      remaining: number;
      retryAfterSeconds: number;
      /** Set on the login route only */
      maxAttempts?: number;
    };

function stripPath(url: string): string {
  const path = url.split('?')[0];
  return path.length > 1 && path.endsWith('/') ? path.slice(0, -1) : path;
}

@Injectable()
export class RequestGateService {
  private readonly logger = new Logger(RequestGateService.name);
  private readonly loginPath: string;

  constructor(
    private readonly admission: AdmissionControllerService,
    @Inject(RATE_LIMIT_OPTIONS) options: RateLimitOptions,
  ) {
    this.loginPath = stripPath(options.loginPath);
  }

  classify(url: string): RateLimitPolicyName {
    return stripPath(url) === this.loginPath ? 'loginRoute' : 'default';
  }

  admit(request: GateRequest): GateDecision {
    const address = resolveClientAddress(request);
    const routeClass = this.classify(request.url);
    const key = `${address}:${routeClass}`;

    const admission = this.admission.check(key, routeClass);
    if (admission.allowed) {
      return {
        outcome: 'forwarded',
        key,
        routeClass,
        limit: admission.limit,
        remaining: admission.remaining,
      };
    }

    this.logger.warn(`Rate limit exceeded for ${key}, retry in ${admission.waitSeconds}s`);
    return {
      outcome: 'rejected',
      key,
      routeClass,
      limit: admission.limit,
      remaining: admission.remaining,
      retryAfterSeconds: admission.waitSeconds,
      maxAttempts: routeClass === 'loginRoute' ? admission.limit : undefined,
    };
  }
}

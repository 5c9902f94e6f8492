/**
 * Admission Guard
 * Runs the request gate before every route handler
 */

import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Request, Response } from 'express';
import { ERRORS } from '@tollgate/common/errors';
import { RequestGateService } from './request-gate.service';

@Injectable()
export class AdmissionGuard implements CanActivate {
  constructor(private readonly gate: RequestGateService) {}

  canActivate(context: ExecutionContext): boolean {
    const http = context.switchToHttp();
    const request = http.getRequest<Request>();
    const response = http.getResponse<Response>();

    const decision = this.gate.admit({
      url: request.originalUrl || request.url,
      headers: request.headers,
      socket: request.socket,
    });

    if (decision.outcome === 'rejected') {
      throw ERRORS.RateLimitExceeded({
        retryAfterSeconds: decision.retryAfterSeconds,
        remaining: decision.remaining,
        limit: decision.limit,
        maxAttempts: decision.maxAttempts,
      });
    }

    response.setHeader('X-RateLimit-Limit', String(decision.limit));
    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    return true;
  }
}

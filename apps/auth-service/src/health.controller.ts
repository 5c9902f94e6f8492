/**
 * Tollgate Auth Service - Health Controller
 */

import { Controller, Get } from '@nestjs/common';

export interface HealthResponse {
  status: 'healthy';
  service: string;
  timestamp: string;
}

@Controller('health')
export class HealthController {
  @Get()
  health(): HealthResponse {
    return {
      status: 'healthy',
      service: 'auth-service',
      timestamp: new Date().toISOString(),
    };
  }
}

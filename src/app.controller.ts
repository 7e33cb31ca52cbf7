import { Controller, Get } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { ServiceInfo } from './common/interfaces/service-info.interface';

export const SERVICE_NAME = 'portfolio-rebalancer';

@Controller()
export class AppController {
  /**
   * Liveness check for load balancers.
   *
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: SERVICE_NAME,
    };
  }

  // GET /
  @Get()
  getRoot(): ServiceInfo {
    return {
      service: SERVICE_NAME,
      description: 'Splits a new investment across categories toward their target allocation',
      endpoints: {
        health: 'GET /health',
        rebalance: 'POST /rebalance',
      },
      rebalanceBody: ['categories', 'targetAllocation', 'balances', 'investmentAmount', 'cashSymbol?'],
    };
  }
}

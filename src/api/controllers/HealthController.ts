import type { Request, Response } from 'express';
import { BaseController } from './BaseController';
import type { HealthIndicator } from '../../types';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/error';

interface DependencyCheck {
  healthy: boolean;
  responseTime?: number;
  error?: string;
}

/**
 * Health check controller for monitoring system status
 */
export class HealthController extends BaseController {
  constructor(
    private dependencies: Record<string, HealthIndicator>,
    private version: string
  ) {
    super();
  }

  /**
   * GET /health
   */
  healthCheck = (req: Request, res: Response): void => {
    const services: Record<string, boolean> = {};
    for (const [name, indicator] of Object.entries(this.dependencies)) {
      services[name] = indicator.isHealthy();
    }

    this.success(res, {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: this.version,
      services,
    });
  };

  /**
   * GET /health/detailed
   */
  detailedHealthCheck = this.handle(async (req: Request, res: Response) => {
    const checks: Record<string, DependencyCheck> = {};
    for (const [name, indicator] of Object.entries(this.dependencies)) {
      checks[name] = await this.checkDependency(name, indicator);
    }

    const isHealthy = Object.values(checks).every(check => check.healthy);

    this.success(
      res,
      {
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        checks,
      },
      isHealthy ? 200 : 503
    );
  });

  private async checkDependency(name: string, indicator: HealthIndicator): Promise<DependencyCheck> {
    try {
      const { connected, latency, error } = await indicator.healthCheck();
      if (!connected) {
        logger.error('Health check failed', { dependency: name, error });
        return { healthy: false, error: error ?? `${name} not connected` };
      }
      return { healthy: true, responseTime: latency };
    } catch (error) {
      logger.error('Health check failed', { dependency: name, error: errorMessage(error) });
      return { healthy: false, error: errorMessage(error) };
    }
  }
}

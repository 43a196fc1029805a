/**
 * Health Controller
 *
 * Handles health check endpoint with comprehensive system status.
 */

import type { Request, Response } from 'express';
import { BaseController } from './base.controller';
import type { HealthCheckResponse, ServiceHealth } from '../models/dtos/common.dto';
import { errorMessage } from '../models/errors/api-error';
import { logger } from '../utils/logger';

export interface HealthProbes {
  database: () => Promise<void>;
  redis: () => Promise<void>;
  /** Names of the registered sinks and the number of dispatches in flight */
  dispatch: () => { sinks: string[]; inFlight: number };
}

export class HealthController extends BaseController {
  constructor(
    private readonly probes: HealthProbes,
    private readonly version: string
  ) {
    super();
  }

  /**
   * GET /health
   * Comprehensive health check including database and Redis connectivity
   */
  async checkHealth(_req: Request, res: Response): Promise<Response> {
    const [database, redis] = await Promise.all([
      this.probe('database', this.probes.database),
      this.probe('redis', this.probes.redis),
    ]);

    const health: HealthCheckResponse = {
      status: database.status === 'up' && redis.status === 'up' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      version: this.version,
      uptime: process.uptime(),
      services: { database, redis },
      dispatch: this.probes.dispatch(),
      memory: process.memoryUsage(),
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check failed', { services: health.services });
    }

    return this.success(res, health);
  }

  private async probe(name: string, check: () => Promise<void>): Promise<ServiceHealth> {
    const startTime = Date.now();
    try {
      await check();
      return { status: 'up', latency: Date.now() - startTime };
    } catch (error) {
      logger.error(`${name} health check failed`, { error: errorMessage(error) });
      return { status: 'down', error: errorMessage(error) };
    }
  }
}

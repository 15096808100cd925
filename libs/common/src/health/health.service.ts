import { Inject, Injectable, Logger } from '@nestjs/common';
import { HealthCheckResult } from '../interfaces/health-check-result.interface';
import { HealthOptions } from '../interfaces/health-option.interface';

export const HEALTH_OPTIONS = 'HEALTH_OPTIONS';

export interface OverallHealth {
  service: string;
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  details: Record<string, HealthCheckResult>;
}

@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(@Inject(HEALTH_OPTIONS) private readonly options: HealthOptions) {}

  async checkOverallHealth(): Promise<OverallHealth> {
    const [redis, database, additionalChecks] = await Promise.all([
      this.checkRedisHealth(),
      this.checkDatabaseHealth(),
      this.checkAdditional(),
    ]);

    const details: Record<string, HealthCheckResult> = { redis, database, ...additionalChecks };
    const isHealthy = Object.values(details).every(check => check.status !== 'down');

    return {
      service: this.options.serviceName,
      status: isHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      details,
    };
  }

  async checkRedisHealth(): Promise<HealthCheckResult> {
    const redis = this.options.redis;
    if (!redis) {
      return { status: 'disabled' };
    }
    try {
      await redis.ping();
      return { status: 'up' };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Redis health check failed: ${errorMessage}`);
      return { status: 'down', error: errorMessage };
    }
  }

  async checkDatabaseHealth(): Promise<HealthCheckResult> {
    try {
      const isHealthy = await this.options.database.healthCheck();
      return isHealthy ? { status: 'up' } : { status: 'down', error: 'Database did not answer' };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      this.logger.error(`Database health check failed: ${errorMessage}`);
      return { status: 'down', error: errorMessage };
    }
  }

  private async checkAdditional(): Promise<Record<string, HealthCheckResult>> {
    const result: Record<string, HealthCheckResult> = {};

    for (const [name, checkFn] of Object.entries(this.options.additionalChecks)) {
      try {
        const isHealthy = await checkFn();
        result[name] = { status: isHealthy ? 'up' : 'down' };
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : 'Unknown error';
        this.logger.error(`Additional health check "${name}" failed: ${errorMessage}`);
        result[name] = { status: 'down', error: errorMessage };
      }
    }

    return result;
  }
}

import { Controller, Get } from '@nestjs/common';
import { Public } from '../decorators/public.decorator';
import { HealthCheckResult } from '../interfaces/health-check-result.interface';
import { HealthService, OverallHealth } from './health.service';

@Controller('health')
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  @Get()
  @Public()
  async checkHealth(): Promise<OverallHealth> {
    return this.healthService.checkOverallHealth();
  }

  @Get('redis')
  @Public()
  async checkRedis(): Promise<HealthCheckResult> {
    return this.healthService.checkRedisHealth();
  }

  @Get('database')
  @Public()
  async checkDatabase(): Promise<HealthCheckResult> {
    return this.healthService.checkDatabaseHealth();
  }
}

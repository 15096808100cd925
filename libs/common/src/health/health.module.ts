import { DynamicModule, FactoryProvider, Module, ModuleMetadata } from '@nestjs/common';
import { HealthOptions } from '../interfaces/health-option.interface';
import { HealthController } from './health.controller';
import { HEALTH_OPTIONS, HealthService } from './health.service';

export type HealthModuleOptions = Omit<HealthOptions, 'additionalChecks' | 'serviceName'> &
  Partial<Pick<HealthOptions, 'additionalChecks' | 'serviceName'>>;

export interface HealthModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: FactoryProvider<Promise<HealthModuleOptions> | HealthModuleOptions>['useFactory'];
  inject?: FactoryProvider['inject'];
}

function normalize(options: HealthModuleOptions): HealthOptions {
  return {
    serviceName: options.serviceName ?? 'unknown-service',
    database: options.database,
    redis: options.redis,
    additionalChecks: options.additionalChecks ?? {},
  };
}

@Module({})
export class HealthModule {
  static forRoot(options: HealthModuleOptions): DynamicModule {
    return {
      module: HealthModule,
      controllers: [HealthController],
      providers: [{ provide: HEALTH_OPTIONS, useValue: normalize(options) }, HealthService],
      exports: [HealthService],
    };
  }

  static forRootAsync(options: HealthModuleAsyncOptions): DynamicModule {
    return {
      module: HealthModule,
      imports: options.imports ?? [],
      controllers: [HealthController],
      providers: [
        {
          provide: HEALTH_OPTIONS,
          useFactory: async (...args: unknown[]) => normalize(await options.useFactory(...args)),
          inject: options.inject ?? [],
        },
        HealthService,
      ],
      exports: [HealthService],
    };
  }
}

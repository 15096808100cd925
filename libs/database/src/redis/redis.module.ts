import { DispatchConfigService } from '@app/common/config/config.service';
import { DynamicModule, Logger, Module, Provider } from '@nestjs/common';
import Redis from 'ioredis';

export const REDIS_CLIENT = 'REDIS_CLIENT';

@Module({})
export class RedisModule {
  /**
   * Provides REDIS_CLIENT: an ioredis connection when cross-instance messaging
   * is enabled, otherwise null.
   */
  static forRoot(): DynamicModule {
    const redisProvider: Provider = {
      provide: REDIS_CLIENT,
      useFactory: (config: DispatchConfigService): Redis | null => {
        if (!config.messagingRedisEnabled) {
          return null;
        }
        const client = new Redis({
          host: config.redisHost,
          port: config.redisPort,
          password: config.redisPassword,
          maxRetriesPerRequest: 3,
          lazyConnect: true,
        });
        client.on('error', (error: Error) => {
          new Logger(RedisModule.name).error(`Redis connection error: ${error.message}`);
        });
        return client;
      },
      inject: [DispatchConfigService],
    };

    return {
      module: RedisModule,
      providers: [redisProvider],
      exports: [redisProvider],
      global: true,
    };
  }
}

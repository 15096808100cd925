import { DynamicModule, Module } from '@nestjs/common';
import { PostgresModule } from './postgres/postgres.module';
import { RedisModule } from './redis/redis.module';

@Module({})
export class DatabaseModule {
  static forRoot(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [PostgresModule, RedisModule.forRoot()],
      exports: [PostgresModule, RedisModule],
      global: true,
    };
  }
}

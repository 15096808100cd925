export * from './database.module';
export * from './postgres/postgres.module';
export * from './postgres/postgres.service';
export * from './postgres/sql-executor.interface';
export * from './redis/redis.module';

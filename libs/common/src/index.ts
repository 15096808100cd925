export * from './config';
export * from './constants';
export * from './decorators';
export * from './entities';
export * from './enums';
export * from './exceptions';
export * from './filters';
export * from './guards';
export * from './health/health.controller';
export * from './health/health.module';
export * from './health/health.service';
export * from './interceptors';
export * from './interfaces';
export * from './modules';
export * from './utils';

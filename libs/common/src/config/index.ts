export * from './config.module';
export * from './config.service';
export * from './env.validation';

export * from './events/event-types';
export * from './messaging.module';
export * from './messaging.service';

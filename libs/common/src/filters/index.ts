export * from './error.filter';

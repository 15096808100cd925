export * from './dispatch.exception';

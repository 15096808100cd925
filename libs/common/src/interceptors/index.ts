export * from './response.interceptor';

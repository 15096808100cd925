export * from './enum.util';
export * from './money.util';

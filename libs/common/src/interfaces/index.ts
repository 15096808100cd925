export * from './authenticated-user.interface';
export * from './health-check-result.interface';
export * from './health-option.interface';

export * from './order-status.enum';
export * from './order-type.enum';
export * from './transaction-type.enum';
export * from './user-role.enum';

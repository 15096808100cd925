export * from './order.entity';
export * from './order-status-log.entity';
export * from './platform-setting.entity';
export * from './rating.entity';
export * from './wallet.entity';

export * from './platform-setting.constant';
export * from './price.constant';

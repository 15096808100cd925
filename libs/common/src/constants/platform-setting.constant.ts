export enum PlatformSettingKey {
  DEFAULT_COMMISSION = 'default_commission',
  TAXI_BASE_PRICE = 'taxi_base_price',
  TAXI_PRICE_PER_KM = 'taxi_price_per_km',
  DELIVERY_BASE_PRICE = 'delivery_base_price',
  DELIVERY_PRICE_PER_KM = 'delivery_price_per_km',
}

const SETTING_KEYS: readonly string[] = Object.values(PlatformSettingKey);

export function isPlatformSettingKey(value: unknown): value is PlatformSettingKey {
  return typeof value === 'string' && SETTING_KEYS.includes(value);
}

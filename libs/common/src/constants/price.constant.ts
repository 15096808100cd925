// All amounts in minor units (1 major unit = 100 minor units)
export const PRICE_CONSTANTS = {
  MINOR_UNITS_PER_MAJOR: 100,
  DEFAULT_COMMISSION: 500_000,
  TAXI_BASE_PRICE: 500_000,
  TAXI_PRICE_PER_KM: 500_000,
  DELIVERY_BASE_PRICE: 300_000,
  DELIVERY_PRICE_PER_KM: 250_000,
};

export const WALLET_CONSTANTS = {
  DEFAULT_TRANSACTION_LIMIT: 50,
  MAX_TRANSACTION_LIMIT: 200,
  // Largest amount that stays exact as a JS number once read back from BIGINT
  MAX_AMOUNT_MINOR: Number.MAX_SAFE_INTEGER,
};

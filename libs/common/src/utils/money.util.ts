import { PRICE_CONSTANTS } from '../constants/price.constant';

const { MINOR_UNITS_PER_MAJOR } = PRICE_CONSTANTS;

// 5500000 -> "55000.00"
export function formatMinorUnits(minor: number): string {
  const sign = minor < 0 ? '-' : '';
  const absolute = Math.abs(minor);
  const whole = Math.floor(absolute / MINOR_UNITS_PER_MAJOR);
  const fraction = absolute % MINOR_UNITS_PER_MAJOR;
  return `${sign}${whole}.${String(fraction).padStart(2, '0')}`;
}

export function isPositiveMinorAmount(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

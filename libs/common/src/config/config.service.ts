import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PRICE_CONSTANTS } from '../constants/price.constant';

@Injectable()
export class DispatchConfigService {
  constructor(private readonly configService: ConfigService) {}

  get isProduction(): boolean {
    return this.configService.get<string>('NODE_ENV') === 'production';
  }

  get port(): number {
    return this.getNumber('PORT', 3000);
  }

  get logLevel(): string {
    return this.configService.get<string>('LOG_LEVEL') ?? (this.isProduction ? 'info' : 'debug');
  }

  get databaseUrl(): string {
    return this.configService.getOrThrow<string>('DATABASE_URL');
  }

  get databasePoolMax(): number {
    return this.getNumber('DB_POOL_MAX', 10);
  }

  get databaseSsl(): boolean {
    return this.getBoolean('DB_SSL', false);
  }

  get autoMigrate(): boolean {
    return this.getBoolean('DB_AUTO_MIGRATE', false);
  }

  get messagingRedisEnabled(): boolean {
    return this.getBoolean('MESSAGING_REDIS_ENABLED', false);
  }

  get redisHost(): string {
    return this.configService.get<string>('REDIS_HOST') ?? 'localhost';
  }

  get redisPort(): number {
    return this.getNumber('REDIS_PORT', 6379);
  }

  get redisPassword(): string | undefined {
    return this.configService.get<string>('REDIS_PASSWORD') || undefined;
  }

  get mapsApiKey(): string {
    return this.configService.get<string>('GOOGLE_MAPS_API_KEY') ?? '';
  }

  get mapsBaseUrl(): string {
    return this.configService.get<string>('MAPS_BASE_URL') ?? 'https://maps.googleapis.com/maps/api';
  }

  get pricingTimeoutMs(): number {
    return this.getNumber('PRICING_TIMEOUT_MS', 5000);
  }

  get smsProviderUrl(): string | undefined {
    return this.configService.get<string>('SMS_PROVIDER_URL') || undefined;
  }

  get smsApiKey(): string {
    return this.configService.get<string>('SMS_API_KEY') ?? '';
  }

  get smsSenderId(): string {
    return this.configService.get<string>('SMS_SENDER_ID') ?? '';
  }

  get locationLinkBaseUrl(): string {
    return this.configService.get<string>('LOCATION_LINK_BASE_URL') ?? 'http://localhost:3000';
  }

  get defaultCommissionMinor(): number {
    return this.getNumber('DEFAULT_COMMISSION_MINOR', PRICE_CONSTANTS.DEFAULT_COMMISSION);
  }

  get taxiBasePriceMinor(): number {
    return this.getNumber('TAXI_BASE_PRICE_MINOR', PRICE_CONSTANTS.TAXI_BASE_PRICE);
  }

  get taxiPricePerKmMinor(): number {
    return this.getNumber('TAXI_PRICE_PER_KM_MINOR', PRICE_CONSTANTS.TAXI_PRICE_PER_KM);
  }

  get deliveryBasePriceMinor(): number {
    return this.getNumber('DELIVERY_BASE_PRICE_MINOR', PRICE_CONSTANTS.DELIVERY_BASE_PRICE);
  }

  get deliveryPricePerKmMinor(): number {
    return this.getNumber('DELIVERY_PRICE_PER_KM_MINOR', PRICE_CONSTANTS.DELIVERY_PRICE_PER_KM);
  }

  get realtimeStaleAfterMs(): number {
    return this.getNumber('REALTIME_STALE_AFTER_MS', 10 * 60 * 1000);
  }

  private getNumber(key: string, fallback: number): number {
    const raw = this.configService.get<string | number>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
  }

  private getBoolean(key: string, fallback: boolean): boolean {
    const raw = this.configService.get<string | boolean>(key);
    if (raw === undefined || raw === '') {
      return fallback;
    }
    return raw === true || raw === 'true' || raw === '1';
  }
}

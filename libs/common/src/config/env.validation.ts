import { plainToInstance } from 'class-transformer';
import { IsBoolean, IsIn, IsInt, IsOptional, IsPositive, IsString, IsUrl, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsIn(['development', 'production', 'test'])
  NODE_ENV?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  PORT?: number;

  @IsOptional()
  @IsIn(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  LOG_LEVEL?: string;

  @IsString()
  DATABASE_URL!: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  DB_POOL_MAX?: number;

  @IsOptional()
  @IsBoolean()
  DB_SSL?: boolean;

  @IsOptional()
  @IsBoolean()
  DB_AUTO_MIGRATE?: boolean;

  @IsOptional()
  @IsBoolean()
  MESSAGING_REDIS_ENABLED?: boolean;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @IsInt()
  REDIS_PORT?: number;

  @IsOptional()
  @IsString()
  GATEWAY_SECRET_KEY?: string;

  @IsOptional()
  @IsString()
  GOOGLE_MAPS_API_KEY?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  MAPS_BASE_URL?: string;

  @IsOptional()
  @IsInt()
  @IsPositive()
  PRICING_TIMEOUT_MS?: number;

  @IsOptional()
  @IsUrl({ require_tld: false })
  SMS_PROVIDER_URL?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  LOCATION_LINK_BASE_URL?: string;

  @IsOptional()
  @IsInt()
  @Min(0)
  DEFAULT_COMMISSION_MINOR?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  TAXI_BASE_PRICE_MINOR?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  TAXI_PRICE_PER_KM_MINOR?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  DELIVERY_BASE_PRICE_MINOR?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  DELIVERY_PRICE_PER_KM_MINOR?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  REALTIME_STALE_AFTER_MS?: number;
}

/**
 * `validate` hook for ConfigModule.forRoot. Returns the raw record untouched so
 * ConfigService keeps serving strings; DispatchConfigService does the parsing.
 */
export function validateEnvironment(config: Record<string, unknown>): Record<string, unknown> {
  const validated = plainToInstance(EnvironmentVariables, config, { enableImplicitConversion: true });
  const errors = validateSync(validated, { skipMissingProperties: false });

  if (errors.length > 0) {
    const details = errors.map(error => Object.values(error.constraints ?? {}).join(', ')).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return config;
}

import { DispatchConfigModule } from '@app/common/config/config.module';
import { GatewayIdentityVerifier } from '@app/common/guards/gateway-identity.verifier';
import { TrustedGatewayGuard } from '@app/common/guards/trusted-gateway.guard';
import { HealthModule } from '@app/common/health/health.module';
import { LoggingModule } from '@app/common/modules/logging.module';
import { DatabaseModule, PostgresService, REDIS_CLIENT } from '@app/database';
import { MessagingModule } from '@app/messaging';
import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ScheduleModule } from '@nestjs/schedule';
import Redis from 'ioredis';
import { AdminModule } from './admin/admin.module';
import { AuditModule } from './audit/audit.module';
import { OrderModule } from './order/order.module';
import { PricingModule } from './pricing/pricing.module';
import { RatingModule } from './rating/rating.module';
import { RealtimeModule } from './realtime/realtime.module';
import { SettingsModule } from './settings/settings.module';
import { SmsModule } from './sms/sms.module';
import { WalletModule } from './wallet/wallet.module';

export const SERVICE_NAME = 'dispatch-service';

/**
 * @module DispatchModule
 * @description Root module: order lifecycle, driver wallets and realtime fan-out in one process
 */
@Module({
  imports: [
    DispatchConfigModule,
    LoggingModule,
    DatabaseModule.forRoot(),
    MessagingModule.forRootAsync({
      useFactory: () => ({ serviceName: SERVICE_NAME }),
    }),
    HealthModule.forRootAsync({
      useFactory: (postgres: PostgresService, redis: Redis | null) => ({
        serviceName: SERVICE_NAME,
        database: postgres,
        redis: redis ?? undefined,
      }),
      inject: [PostgresService, REDIS_CLIENT],
    }),
    ScheduleModule.forRoot(),
    SettingsModule,
    AuditModule,
    WalletModule,
    PricingModule,
    SmsModule,
    OrderModule,
    RatingModule,
    RealtimeModule,
    AdminModule,
  ],
  providers: [
    GatewayIdentityVerifier,
    {
      provide: APP_GUARD,
      useClass: TrustedGatewayGuard,
    },
  ],
})
export class DispatchModule {}

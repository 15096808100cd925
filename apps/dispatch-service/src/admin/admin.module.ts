import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { OrderModule } from '../order/order.module';
import { RatingModule } from '../rating/rating.module';
import { RealtimeModule } from '../realtime/realtime.module';
import { SettingsModule } from '../settings/settings.module';
import { WalletModule } from '../wallet/wallet.module';
import { AdminController } from './admin.controller';
import { AdminService } from './admin.service';

@Module({
  imports: [OrderModule, AuditModule, WalletModule, RatingModule, SettingsModule, RealtimeModule],
  controllers: [AdminController],
  providers: [AdminService],
})
export class AdminModule {}

import { Module } from '@nestjs/common';
import { SettingsModule } from '../settings/settings.module';
import { WalletRepository } from './repositories/wallet.repository';
import { WalletController } from './wallet.controller';
import { WalletService } from './wallet.service';

@Module({
  imports: [SettingsModule],
  controllers: [WalletController],
  providers: [WalletService, WalletRepository],
  exports: [WalletService],
})
export class WalletModule {}

import { DispatchConfigService } from '@app/common/config/config.service';
import { PlatformSettingKey } from '@app/common/constants/platform-setting.constant';
import { OrderType } from '@app/common/enums/order-type.enum';
import { DomainValidationException } from '@app/common/exceptions/dispatch.exception';
import { Injectable, Logger } from '@nestjs/common';
import { SettingsRepository } from './repositories/settings.repository';

export interface EffectiveSetting {
  key: PlatformSettingKey;
  value: number;
  isDefault: boolean;
  updatedAt: Date | null;
  updatedBy: string | null;
}

export interface PricingRate {
  basePriceMinor: number;
  pricePerKmMinor: number;
}

/**
 * Platform-wide values an admin may change at run time. Stored rows win over
 * the configured defaults.
 */
@Injectable()
export class SettingsService {
  private readonly logger = new Logger(SettingsService.name);

  constructor(
    private readonly settingsRepository: SettingsRepository,
    private readonly config: DispatchConfigService,
  ) {}

  async getValue(key: PlatformSettingKey): Promise<number> {
    const stored = await this.settingsRepository.findByKey(key);
    return stored ? stored.value : this.defaultFor(key);
  }

  async getDefaultCommission(): Promise<number> {
    return this.getValue(PlatformSettingKey.DEFAULT_COMMISSION);
  }

  async getPricing(type: OrderType): Promise<PricingRate> {
    const [baseKey, perKmKey] =
      type === OrderType.TAXI
        ? [PlatformSettingKey.TAXI_BASE_PRICE, PlatformSettingKey.TAXI_PRICE_PER_KM]
        : [PlatformSettingKey.DELIVERY_BASE_PRICE, PlatformSettingKey.DELIVERY_PRICE_PER_KM];

    const [basePriceMinor, pricePerKmMinor] = await Promise.all([this.getValue(baseKey), this.getValue(perKmKey)]);
    return { basePriceMinor, pricePerKmMinor };
  }

  async listSettings(): Promise<EffectiveSetting[]> {
    const stored = new Map((await this.settingsRepository.findAll()).map(setting => [setting.key, setting]));

    return Object.values(PlatformSettingKey).map(key => {
      const setting = stored.get(key);
      return setting
        ? { key, value: setting.value, isDefault: false, updatedAt: setting.updatedAt, updatedBy: setting.updatedBy }
        : { key, value: this.defaultFor(key), isDefault: true, updatedAt: null, updatedBy: null };
    });
  }

  async updateSetting(key: PlatformSettingKey, value: number, adminId: string): Promise<EffectiveSetting> {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new DomainValidationException(`Setting ${key} must be a non-negative integer amount in minor units`);
    }

    try {
      const saved = await this.settingsRepository.upsert(key, value, adminId);
      this.logger.log(`Setting ${key} changed to ${value} by admin ${adminId}`);
      return { key, value: saved.value, isDefault: false, updatedAt: saved.updatedAt, updatedBy: saved.updatedBy };
    } catch (error) {
      this.logger.error(`Failed to update setting ${key}:`, error);
      throw error;
    }
  }

  private defaultFor(key: PlatformSettingKey): number {
    switch (key) {
      case PlatformSettingKey.DEFAULT_COMMISSION:
        return this.config.defaultCommissionMinor;
      case PlatformSettingKey.TAXI_BASE_PRICE:
        return this.config.taxiBasePriceMinor;
      case PlatformSettingKey.TAXI_PRICE_PER_KM:
        return this.config.taxiPricePerKmMinor;
      case PlatformSettingKey.DELIVERY_BASE_PRICE:
        return this.config.deliveryBasePriceMinor;
      case PlatformSettingKey.DELIVERY_PRICE_PER_KM:
        return this.config.deliveryPricePerKmMinor;
    }
  }
}

import { PlatformSettingKey } from '@app/common/constants/platform-setting.constant';
import { WALLET_CONSTANTS } from '@app/common/constants/price.constant';
import { IsEnum, IsInt, Max, Min } from 'class-validator';

export class UpdateSettingDto {
  @IsEnum(PlatformSettingKey)
  key!: PlatformSettingKey;

  @IsInt()
  @Min(0)
  @Max(WALLET_CONSTANTS.MAX_AMOUNT_MINOR)
  value!: number;
}

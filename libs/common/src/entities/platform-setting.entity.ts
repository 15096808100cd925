import { PlatformSettingKey } from '../constants/platform-setting.constant';

export interface PlatformSetting {
  key: PlatformSettingKey;
  value: number;
  updatedAt: Date;
  updatedBy: string | null;
}

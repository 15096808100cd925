import { PlatformSettingKey } from '@app/common/constants/platform-setting.constant';
import { PlatformSetting } from '@app/common/entities/platform-setting.entity';
import { parseEnumValue } from '@app/common/utils/enum.util';
import { PostgresService, SqlExecutor } from '@app/database';
import { Injectable } from '@nestjs/common';

interface PlatformSettingRow {
  key: string;
  value: string;
  updated_at: Date;
  updated_by: string | null;
}

const SETTING_KEYS = Object.values(PlatformSettingKey);

@Injectable()
export class SettingsRepository {
  constructor(private readonly postgres: PostgresService) {}

  async findAll(db: SqlExecutor = this.postgres): Promise<PlatformSetting[]> {
    const result = await db.query<PlatformSettingRow>('SELECT * FROM platform_settings ORDER BY key ASC');
    return result.rows.map(row => this.toEntity(row));
  }

  async findByKey(key: PlatformSettingKey, db: SqlExecutor = this.postgres): Promise<PlatformSetting | null> {
    const result = await db.query<PlatformSettingRow>('SELECT * FROM platform_settings WHERE key = $1', [key]);
    return result.rows.length > 0 ? this.toEntity(result.rows[0]) : null;
  }

  async upsert(
    key: PlatformSettingKey,
    value: number,
    updatedBy: string,
    db: SqlExecutor = this.postgres,
  ): Promise<PlatformSetting> {
    const result = await db.query<PlatformSettingRow>(
      `INSERT INTO platform_settings (key, value, updated_at, updated_by)
       VALUES ($1, $2, NOW(), $3)
       ON CONFLICT (key) DO UPDATE SET value = EXCLUDED.value, updated_at = NOW(), updated_by = EXCLUDED.updated_by
       RETURNING *`,
      [key, value, updatedBy],
    );
    return this.toEntity(result.rows[0]);
  }

  private toEntity(row: PlatformSettingRow): PlatformSetting {
    return {
      key: parseEnumValue(SETTING_KEYS, row.key, 'platform setting'),
      value: Number(row.value),
      updatedAt: row.updated_at,
      updatedBy: row.updated_by,
    };
  }
}

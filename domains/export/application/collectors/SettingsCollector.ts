import type { SettingRow, SettingsRepository } from '@domain/settings/application/ports/SettingsRepository';

import { toNullableString, toText } from '../../domain/encoding';
import {
  type CollectorResult,
  type ExportedSetting,
  type SettingsDocument,
  ok,
  unavailable,
} from '../../domain/types';
import type { DomainCollector } from './DomainCollector';

export const SETTINGS_UNAVAILABLE = 'Settings table tp_settings not found.';

export function mapSettingRow(row: SettingRow): ExportedSetting {
  return {
    key: toText(row.key),
    value: toNullableString(row.value),
    autoload: row.autoload ?? true,
  };
}

/**
* Exports all settings, not only autoloaded ones
*/
export class SettingsCollector implements DomainCollector<SettingsDocument> {
  readonly domain = 'settings';

  constructor(private readonly settings: SettingsRepository | null) {}

  async collect(): Promise<CollectorResult<SettingsDocument>> {
    if (!this.settings || !(await this.settings.tableExists())) {
      return unavailable(SETTINGS_UNAVAILABLE);
    }

    const rows = await this.settings.listAll();
    const items = rows.map(mapSettingRow);
    return ok({ count: items.length, items });
  }

  fallback(reason: string): CollectorResult<SettingsDocument> {
    return unavailable(reason);
  }
}

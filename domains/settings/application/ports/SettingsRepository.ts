/**
* Raw tp_settings row
*/
export interface SettingRow {
  key: string | null;
  value: unknown;
  autoload: boolean | null;
}

/**
* Read access to the key/value settings store
*/
export interface SettingsRepository {
  /** Whether tp_settings exists */
  tableExists(): Promise<boolean>;

  /** Every row, autoloaded or not, ordered by key ascending */
  listAll(): Promise<SettingRow[]>;
}

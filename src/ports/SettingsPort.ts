/** Read-only view of the settings table. Absence means "not configured", never an error. */
export interface SettingsPort {
  get(key: string): string | undefined;
}

/**
 * Settings singleton — loaded once from config files and env vars.
 */
import { loadSettings } from "./config-loader.ts";
import type { Settings } from "./config-schema.ts";

export { SettingsSchema } from "./config-schema.ts";
export type { Settings, PatternsConfig } from "./config-schema.ts";

let _settings: Settings | null = null;

export function getSettings(): Settings {
  if (!_settings) {
    _settings = loadSettings();
  }
  return _settings;
}

/** Override settings (for testing) */
export function setSettings(s: Settings): void {
  _settings = s;
}

/** Reset settings singleton so next getSettings() reloads (for testing) */
export function resetSettings(): void {
  _settings = null;
}

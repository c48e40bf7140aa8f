import type { AppConfigRepository } from '../infra/repositories/AppConfigRepository.js';
import {
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  settingsPatchSchema,
  settingsSchema,
  type Settings,
} from '../domain/entities/Settings.js';
import { ValidationError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * SettingsService - typed view over the app_config table
 * Stored values that fail validation fall back to their defaults
 */
export class SettingsService {
  constructor(private configRepo: AppConfigRepository) {}

  getSettings(): Settings {
    const settings: Record<string, unknown> = {};

    for (const key of SETTING_KEYS) {
      const stored = this.configRepo.get(key);
      const field = settingsSchema.shape[key].safeParse(stored);
      if (stored !== undefined && !field.success) {
        logger.warn('Ignoring invalid stored setting', { key, value: stored });
      }
      settings[key] = stored !== undefined && field.success ? field.data : DEFAULT_SETTINGS[key];
    }

    return settingsSchema.parse(settings);
  }

  get<K extends keyof Settings>(key: K): Settings[K] {
    return this.getSettings()[key];
  }

  updateSettings(patch: unknown): Settings {
    const parsed = settingsPatchSchema.safeParse(patch);
    if (!parsed.success) {
      throw new ValidationError('Invalid settings payload', parsed.error.flatten());
    }

    const entries = Object.entries(parsed.data).filter(([, value]) => value !== undefined);
    this.configRepo.setMany(entries);
    logger.info('Settings updated', { keys: entries.map(([key]) => key) });
    return this.getSettings();
  }

  /**
   * Writes defaults for keys that have never been stored
   */
  ensureDefaults(): void {
    const missing: Array<[string, unknown]> = SETTING_KEYS.filter(
      (key) => this.configRepo.get(key) === undefined
    ).map((key) => [key, DEFAULT_SETTINGS[key]]);

    if (missing.length > 0) {
      this.configRepo.setMany(missing);
      logger.info('Default settings written', { keys: missing.map(([key]) => key) });
    }
  }
}

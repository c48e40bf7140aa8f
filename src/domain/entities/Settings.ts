import { z } from 'zod';

export const MIN_MONITORING_INTERVAL_SECONDS = 60;

/**
 * Settings entity - runtime switches persisted in app_config
 */
export const settingsSchema = z.object({
  autoSaveReports: z.boolean(),
  compareOnStartup: z.boolean(),
  backupReports: z.boolean(),
  maxReports: z.number().int().positive(),
  banSimulatorEnabled: z.boolean(),
  backgroundMonitoring: z.boolean(),
  monitoringIntervalSeconds: z.number().int().min(MIN_MONITORING_INTERVAL_SECONDS, {
    message: `monitoringIntervalSeconds must be at least ${MIN_MONITORING_INTERVAL_SECONDS}`,
  }),
  statsTracking: z.boolean(),
});

export const settingsPatchSchema = settingsSchema.partial().strict();

export type Settings = z.infer<typeof settingsSchema>;
export type SettingsPatch = z.infer<typeof settingsPatchSchema>;
export type SettingKey = keyof Settings;

export const DEFAULT_SETTINGS: Settings = {
  autoSaveReports: true,
  compareOnStartup: false,
  backupReports: true,
  maxReports: 10,
  banSimulatorEnabled: true,
  backgroundMonitoring: false,
  monitoringIntervalSeconds: 300,
  statsTracking: true,
};

export const SETTING_KEYS: readonly SettingKey[] = settingsSchema.keyof().options;

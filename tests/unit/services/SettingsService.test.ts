import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SettingsService } from '../../../src/services/SettingsService.js';
import { AppConfigRepository } from '../../../src/infra/repositories/AppConfigRepository.js';
import { DEFAULT_SETTINGS } from '../../../src/domain/entities/Settings.js';
import { ValidationError } from '../../../src/domain/errors.js';
import { memoryDb } from '../support/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

describe('SettingsService', () => {
  let configRepo: AppConfigRepository;
  let settings: SettingsService;

  beforeEach(() => {
    configRepo = new AppConfigRepository(memoryDb());
    settings = new SettingsService(configRepo);
  });

  it('falls back to defaults for keys never stored', () => {
    expect(settings.getSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('writes defaults only for missing keys', () => {
    configRepo.set('maxReports', 4);
    settings.ensureDefaults();

    expect(configRepo.get('maxReports')).toBe(4);
    expect(configRepo.get('autoSaveReports')).toBe(true);
  });

  it('applies a partial update', () => {
    const updated = settings.updateSettings({ maxReports: 5, statsTracking: false });

    expect(updated).toEqual({ ...DEFAULT_SETTINGS, maxReports: 5, statsTracking: false });
    expect(settings.get('maxReports')).toBe(5);
  });

  it.each([
    [{ maxReports: 0 }],
    [{ monitoringIntervalSeconds: 59 }],
    [{ autoSaveReports: 'yes' }],
    [{ unknownSetting: true }],
  ])('rejects %j', (patch) => {
    expect(() => settings.updateSettings(patch)).toThrow(ValidationError);
    expect(settings.getSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('ignores a stored value that no longer validates', () => {
    configRepo.set('monitoringIntervalSeconds', 5);

    expect(settings.get('monitoringIntervalSeconds')).toBe(300);
    expect(loggerMock.logger.warn).toHaveBeenCalledWith('Ignoring invalid stored setting', {
      key: 'monitoringIntervalSeconds',
      value: 5,
    });
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSentinel, type SentinelContainer } from '../../../src/bootstrap.js';
import { FakeCollector, TEST_RETENTION, hostSnapshot, memoryDb } from '../support/fakes.js';

const loggerMock = vi.hoisted(() => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

vi.mock('../../../src/infra/logger.js', () => loggerMock);

const cronMock = vi.hoisted(() => {
  const stop = vi.fn();
  return { stop, schedule: vi.fn(() => ({ stop })) };
});

vi.mock('node-cron', () => ({ default: cronMock }));

const H1 = '76ed87acbbac1960f4e50eb7c0538c8e3a29fe12ff6d3c5d3c31998b267dd563';
const H2 = 'f6b5339f22c48c2d90cac2f9754de0276d49b87e5c583611deeb0ad455517828';

describe('SentinelService', () => {
  let collector: FakeCollector;
  let container: SentinelContainer;

  beforeEach(() => {
    cronMock.schedule.mockClear();
    collector = new FakeCollector(hostSnapshot({ disks: ['X1'], bios: 'B1' }));
    container = createSentinel({ env: TEST_RETENTION, db: memoryDb(), collector });
  });

  afterEach(() => {
    container.sentinel.stop();
  });

  it('detects a disk swap and bans the new fingerprint', async () => {
    const { sentinel } = container;
    sentinel.start();

    const collectId = sentinel.submit('collect');
    await expect(sentinel.poll(collectId, 2000)).resolves.toMatchObject({
      status: 'success',
      payload: { fingerprint: { hash: H1 }, saved: true },
    });

    const sameId = sentinel.submit('compareOnly');
    await expect(sentinel.poll(sameId, 2000)).resolves.toMatchObject({
      payload: { status: 'unchanged', message: 'Fingerprint matches previous report' },
    });

    collector.snapshot = hostSnapshot({ disks: ['X2'], bios: 'B1' });
    const changedId = sentinel.submit('compareOnly');
    await expect(sentinel.poll(changedId, 2000)).resolves.toMatchObject({
      payload: { status: 'changed', fingerprint: { hash: H2 }, baselineHash: H1 },
    });
    expect(container.statsTracker.getStats().totalChanges).toBe(1);

    await expect(sentinel.ban(H2)).resolves.toMatchObject({ ok: true, code: 'banned' });

    const scanId = sentinel.submit('runAntiCheatCheck');
    await expect(sentinel.poll(scanId, 2000)).resolves.toMatchObject({
      payload: { banned: true, fingerprint: { hash: H2 } },
    });
    expect(sentinel.isBanned(H2)).toBe(true);
    expect(sentinel.isBanned(H1)).toBe(false);
  });

  it('exposes bans through the settings view', async () => {
    const { sentinel } = container;
    await sentinel.ban(H1);

    expect(sentinel.getSettings().bannedFingerprints).toEqual([H1]);
    expect(sentinel.listBans().map((entry) => entry.fingerprint)).toEqual([H1]);

    await expect(sentinel.unban(H1)).resolves.toMatchObject({ ok: true, code: 'unbanned' });
    await expect(sentinel.clearAllBans()).resolves.toBe(0);
  });

  it('starts and stops monitoring when the setting flips', () => {
    const { sentinel } = container;
    sentinel.start();
    expect(sentinel.monitoringStatus().active).toBe(false);

    const enabled = sentinel.updateSettings({ backgroundMonitoring: true });
    expect(enabled.backgroundMonitoring).toBe(true);
    expect(sentinel.monitoringStatus().active).toBe(true);

    sentinel.updateSettings({ backgroundMonitoring: false });
    expect(sentinel.monitoringStatus().active).toBe(false);
  });

  it('starts monitoring at startup when enabled and persists start/stop requests', () => {
    const { sentinel, settings } = container;
    settings.updateSettings({ backgroundMonitoring: true });
    sentinel.start();
    expect(cronMock.schedule).toHaveBeenCalledTimes(1);

    expect(sentinel.stopMonitoring().active).toBe(false);
    expect(settings.get('backgroundMonitoring')).toBe(false);

    expect(sentinel.startMonitoring().active).toBe(true);
    expect(settings.get('backgroundMonitoring')).toBe(true);
  });

  it('runs a comparison on startup when asked to', async () => {
    const { sentinel, settings, reportStore } = container;
    settings.updateSettings({ compareOnStartup: true });

    sentinel.start();
    await vi.waitFor(() => {
      expect(reportStore.loadCurrent()?.fingerprint.hash).toBe(H1);
    });
  });

  it('lists saved reports newest first', async () => {
    const { sentinel } = container;
    sentinel.start();

    await sentinel.poll(sentinel.submit('collect'), 2000);
    collector.snapshot = hostSnapshot({ disks: ['X2'], bios: 'B1' });
    await sentinel.poll(sentinel.submit('collect'), 2000);

    expect(sentinel.loadCurrentReport()?.fingerprint.hash).toBe(H2);
    expect(sentinel.listReportHistory().map((report) => report.fingerprint.hash)).toEqual([H2, H1]);
  });

  it('rejects invalid settings without side effects', () => {
    const { sentinel } = container;

    expect(() => sentinel.updateSettings({ maxReports: -1 })).toThrow('Invalid settings payload');
    expect(sentinel.getSettings().maxReports).toBe(10);
  });
});

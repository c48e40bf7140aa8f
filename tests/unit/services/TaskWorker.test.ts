import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createSentinel, type SentinelContainer } from '../../../src/bootstrap.js';
import { computeFingerprint } from '../../../src/services/FingerprintEngine.js';
import type { TaskEventPayload } from '../../../src/services/TaskEventBus.js';
import type { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
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

const HOST = hostSnapshot({ disks: ['D1'], bios: 'B1', board: 'M1', uuid: 'U1' });
const SWAPPED = hostSnapshot({ disks: ['D1'], bios: 'B1', board: 'M1', uuid: 'U2' });
const HOST_HASH = 'bf295f2826544244ff4c55a9bde33ede174f0ee79e9e98c17f42560b328475ae';

describe('TaskWorker', () => {
  let db: DatabaseAdapter;
  let collector: FakeCollector;
  let container: SentinelContainer;

  beforeEach(() => {
    db = memoryDb();
    collector = new FakeCollector(HOST);
    container = createSentinel({ env: TEST_RETENTION, db, collector });
    container.worker.start();
  });

  afterEach(() => {
    container.worker.stop();
  });

  const run = async (kind: string) => {
    const taskId = container.worker.submit(kind);
    return container.worker.poll(taskId, 2000);
  };

  it('collects and saves when auto-save is on', async () => {
    const result = await run('collect');

    expect(result).toMatchObject({
      kind: 'collect',
      status: 'success',
      payload: { snapshot: HOST, fingerprint: { status: 'valid', hash: HOST_HASH }, saved: true },
    });
    expect(container.reportStore.loadCurrent()?.fingerprint.hash).toBe(HOST_HASH);
  });

  it('collects without saving when auto-save is off', async () => {
    container.settings.updateSettings({ autoSaveReports: false });

    await expect(run('collect')).resolves.toMatchObject({ status: 'success', payload: { saved: false } });
    expect(container.reportStore.loadCurrent()).toBeNull();
  });

  it('collects a host without identifiers but does not save it', async () => {
    collector.snapshot = hostSnapshot({});

    await expect(run('collect')).resolves.toMatchObject({
      status: 'success',
      payload: {
        fingerprint: {
          status: 'invalid',
          hash: 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
        },
        saved: false,
      },
    });
    expect(container.reportStore.loadCurrent()).toBeNull();
  });

  it('gives each concurrently submitted task its own result', async () => {
    const ids = ['collect', 'fetchStats', 'compareOnly'].map((kind) => container.worker.submit(kind));
    const results = await Promise.all(ids.map((id) => container.worker.poll(id, 2000)));

    expect(results.map((result) => [result?.id, result?.kind, result?.status])).toEqual([
      [ids[0], 'collect', 'success'],
      [ids[1], 'fetchStats', 'success'],
      [ids[2], 'compareOnly', 'success'],
    ]);
  });

  it('answers an unknown kind with an error result', async () => {
    await expect(run('reboot')).resolves.toMatchObject({
      kind: 'reboot',
      status: 'error',
      errorMessage: 'unknown task kind: reboot',
    });
  });

  it('turns a handler fault into an error result and keeps running', async () => {
    collector.error = new Error('query timed out');
    await expect(run('collect')).resolves.toMatchObject({
      status: 'error',
      errorMessage: 'query timed out',
    });

    collector.error = null;
    await expect(run('collect')).resolves.toMatchObject({ status: 'success' });
  });

  it('fails a collect that produced no snapshot', async () => {
    collector.snapshot = null;

    await expect(run('collect')).resolves.toMatchObject({
      status: 'error',
      errorMessage: 'Failed to collect hardware data',
    });
  });

  it('compares without overwriting the baseline on change', async () => {
    await expect(run('compareOnly')).resolves.toMatchObject({
      payload: { status: 'no_baseline', baselineHash: null, saved: true },
    });
    await expect(run('compareOnly')).resolves.toMatchObject({
      payload: { status: 'unchanged', baselineHash: HOST_HASH, saved: false },
    });

    collector.snapshot = SWAPPED;
    await expect(run('compareOnly')).resolves.toMatchObject({
      payload: {
        status: 'changed',
        message: 'Fingerprint has changed from previous report',
        baselineHash: HOST_HASH,
        saved: false,
      },
    });

    expect(container.reportStore.loadCurrent()?.fingerprint.hash).toBe(HOST_HASH);
    expect(container.statsTracker.getStats()).toMatchObject({ totalChecks: 3, totalChanges: 1 });
  });

  it('bans the current fingerprint once', async () => {
    await expect(run('banCurrent')).resolves.toMatchObject({
      status: 'success',
      payload: { banned: true, message: 'Fingerprint bf295f28... has been banned' },
    });
    await expect(run('banCurrent')).resolves.toMatchObject({
      status: 'success',
      payload: { banned: false, message: 'Fingerprint bf295f28... is already banned' },
    });
    expect(container.banRegistry.isBanned(HOST_HASH)).toBe(true);
  });

  it('refuses to ban a host without identifiers', async () => {
    collector.snapshot = hostSnapshot({});

    await expect(run('banCurrent')).resolves.toMatchObject({
      status: 'error',
      errorMessage: 'No identifying hardware fields were collected',
    });
    expect(container.banRegistry.list()).toEqual([]);
    expect(container.reportStore.loadCurrent()).toBeNull();

    collector.snapshot = HOST;
    await expect(run('compareOnly')).resolves.toMatchObject({
      status: 'success',
      payload: { status: 'no_baseline', baselineHash: null },
    });
    expect(container.statsTracker.getStats()).toMatchObject({ totalChecks: 1, totalChanges: 0 });
  });

  it('fails a comparison whose baseline cannot be read and leaves it in place', async () => {
    await run('collect');
    db.execute("UPDATE current_report SET snapshot = '{broken' WHERE id = 1");

    const result = await run('compareOnly');

    expect(result).toMatchObject({ status: 'error', errorMessage: 'Failed to read current report' });
    expect(result).not.toHaveProperty('payload');
    expect(db.queryOne<{ snapshot: string }>('SELECT snapshot FROM current_report WHERE id = 1')).toEqual({
      snapshot: '{broken',
    });
    expect(container.statsTracker.getStats()).toMatchObject({ totalChecks: 0 });
  });

  it('runs the anti-cheat check against a fresh scan', async () => {
    await expect(run('runAntiCheatCheck')).resolves.toMatchObject({
      status: 'success',
      payload: {
        banned: false,
        verdict: 'clean',
        scanType: 'fresh_scan',
        stages: ['initializing', 'scanning', 'fingerprinting', 'checking_ban_list', 'finalizing'],
      },
    });

    container.banRegistry.ban(computeFingerprint(HOST).hash);
    await expect(run('runAntiCheatCheck')).resolves.toMatchObject({
      payload: { banned: true, verdict: 'banned', message: 'Fingerprint bf295f28... is BANNED' },
    });
    expect(container.reportStore.loadCurrent()).toBeNull();
  });

  it('reports stats through fetchStats', async () => {
    await run('compareOnly');

    await expect(run('fetchStats')).resolves.toMatchObject({
      payload: {
        trackingEnabled: true,
        stats: { totalChecks: 1, totalChanges: 0 },
        changeFrequency: 0,
        changeRate: 0,
      },
    });
  });

  it('uses a caller-supplied id and rejects a duplicate', async () => {
    expect(container.worker.submit('collect', 'mine')).toBe('mine');
    expect(() => container.worker.submit('collect', 'mine')).toThrow('Task id mine is already in use');

    await expect(container.worker.poll('mine', 2000)).resolves.toMatchObject({ id: 'mine' });
  });

  it('emits lifecycle events and reports idle progress when done', async () => {
    const events: TaskEventPayload[] = [];
    container.taskEventBus.onTask((event) => events.push(event));

    const taskId = container.worker.submit('collect');
    await container.worker.poll(taskId, 2000);

    const statuses = events.filter((event) => event.task.id === taskId).map((event) => event.status);
    expect(statuses[0]).toBe('queued');
    expect(statuses).toContain('running');
    expect(statuses[statuses.length - 1]).toBe('succeeded');
    expect(events.some((event) => event.stage === 'collecting')).toBe(true);
    expect(container.worker.getProgress()).toEqual({
      working: false,
      taskId: null,
      kind: null,
      stage: null,
      queued: 0,
    });
  });
});

describe('TaskWorker stop', () => {
  it('fails queued tasks and later submissions with "worker stopped"', async () => {
    const container = createSentinel({
      env: TEST_RETENTION,
      db: memoryDb(),
      collector: new FakeCollector(HOST),
    });

    const queued = container.worker.submit('collect');
    container.worker.stop();
    const late = container.worker.submit('collect');

    await expect(container.worker.poll(queued, 0)).resolves.toMatchObject({
      status: 'error',
      errorMessage: 'worker stopped',
    });
    await expect(container.worker.poll(late, 0)).resolves.toMatchObject({
      status: 'error',
      errorMessage: 'worker stopped',
    });
  });
});

import type { HardwareCollector } from '../infra/collectors/HardwareCollector.js';
import type { AntiCheatPayload, AntiCheatStage } from '../domain/entities/Task.js';
import type { BanRegistry } from './BanRegistry.js';
import { CollectionError } from '../domain/errors.js';
import { computeFingerprint } from './FingerprintEngine.js';
import { logger } from '../infra/logger.js';

/**
 * AntiCheatService - staged ban check against a fresh scan
 * Never reads the stored report and never writes one
 */
export class AntiCheatService {
  constructor(
    private collector: HardwareCollector,
    private banRegistry: BanRegistry
  ) {}

  async run(onStage: (stage: AntiCheatStage) => void = () => {}): Promise<AntiCheatPayload> {
    const stages: AntiCheatStage[] = [];
    const enter = (stage: AntiCheatStage) => {
      stages.push(stage);
      onStage(stage);
    };

    enter('initializing');

    enter('scanning');
    const snapshot = await this.collector.collect();
    if (!snapshot) {
      throw new CollectionError('Failed to collect hardware data for anti-cheat scan');
    }

    enter('fingerprinting');
    const fingerprint = computeFingerprint(snapshot);
    if (fingerprint.status === 'invalid') {
      throw new CollectionError('No identifying hardware fields were collected');
    }

    enter('checking_ban_list');
    const check = this.banRegistry.check(fingerprint.hash);

    enter('finalizing');
    logger.info('Anti-cheat check completed', {
      verdict: check.banned ? 'banned' : 'clean',
      fingerprint: fingerprint.hash,
    });

    return {
      banned: check.banned,
      verdict: check.banned ? 'banned' : 'clean',
      fingerprint,
      scanType: 'fresh_scan',
      message: check.message,
      stages,
    };
  }
}

import type { BanEntry, BanRepository } from '../infra/repositories/BanRepository.js';
import type { SettingsService } from './SettingsService.js';
import { ValidationError } from '../domain/errors.js';
import { shortHash } from './FingerprintEngine.js';
import { logger } from '../infra/logger.js';

export type BanOutcomeCode = 'banned' | 'already_banned' | 'unbanned' | 'not_banned';

/**
 * Already-banned and not-banned are ordinary outcomes, reported with ok: false
 */
export interface BanOutcome {
  ok: boolean;
  code: BanOutcomeCode;
  message: string;
}

export interface BanCheck {
  banned: boolean;
  message: string;
}

/**
 * BanRegistry - simulated deny-list keyed by fingerprint hash
 */
export class BanRegistry {
  constructor(
    private banRepo: BanRepository,
    private settings: SettingsService,
    private now: () => Date = () => new Date()
  ) {}

  ban(fingerprint: string): BanOutcome {
    const hash = this.normalize(fingerprint);
    if (!this.banRepo.insert(hash, this.now())) {
      return { ok: false, code: 'already_banned', message: `Fingerprint ${shortHash(hash)} is already banned` };
    }

    logger.info('Fingerprint banned', { fingerprint: shortHash(hash) });
    return { ok: true, code: 'banned', message: `Fingerprint ${shortHash(hash)} has been banned` };
  }

  unban(fingerprint: string): BanOutcome {
    const hash = this.normalize(fingerprint);
    if (!this.banRepo.delete(hash)) {
      return { ok: false, code: 'not_banned', message: `Fingerprint ${shortHash(hash)} is not banned` };
    }

    logger.info('Fingerprint unbanned', { fingerprint: shortHash(hash) });
    return { ok: true, code: 'unbanned', message: `Fingerprint ${shortHash(hash)} has been unbanned` };
  }

  isBanned(fingerprint: string): boolean {
    const hash = fingerprint.trim();
    return hash.length > 0 && this.banRepo.has(hash);
  }

  /**
   * Membership as the simulator reports it; always clean while the simulator is off
   */
  check(fingerprint: string): BanCheck {
    if (!this.settings.get('banSimulatorEnabled')) {
      return { banned: false, message: 'Ban simulator is disabled' };
    }

    return this.isBanned(fingerprint)
      ? { banned: true, message: `Fingerprint ${shortHash(fingerprint)} is BANNED` }
      : { banned: false, message: `Fingerprint ${shortHash(fingerprint)} is clean` };
  }

  list(): BanEntry[] {
    return this.banRepo.list();
  }

  clearAll(): number {
    const cleared = this.banRepo.clear();
    logger.info('All fingerprint bans cleared', { cleared });
    return cleared;
  }

  private normalize(fingerprint: string): string {
    const hash = fingerprint.trim();
    if (!hash) {
      throw new ValidationError('Fingerprint must be a non-empty string');
    }
    return hash;
  }
}

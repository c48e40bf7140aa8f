import type { Snapshot } from '../../domain/entities/Snapshot.js';

/**
 * Source of hardware Snapshots
 * null means collection failed as a whole; individual components degrade to raw text instead
 */
export interface HardwareCollector {
  collect(): Promise<Snapshot | null>;
}

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<string>;

export type TextFileReader = (path: string) => Promise<string>;

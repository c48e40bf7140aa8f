/**
 * Fingerprint entity - digest over the canonical identifying subset of a Snapshot
 * 'invalid' marks the degenerate digest of an empty subset, which every host
 * without identifiers would share
 */
export type FingerprintStatus = 'valid' | 'invalid';

export interface Fingerprint {
  status: FingerprintStatus;
  hash: string; // SHA-256 hex
  componentCount: number; // canonical values that went into the hash
}

import { createHash } from 'node:crypto';
import type { Fingerprint } from '../domain/entities/Fingerprint.js';
import { componentEntries, type Snapshot } from '../domain/entities/Snapshot.js';

/**
 * Canonical identifying fields. Every disk serial counts; the other
 * components contribute their first entry only
 */
const CANONICAL_FIELDS: ReadonlyArray<{ component: string; field: string; allEntries: boolean }> = [
  { component: 'disk', field: 'SerialNumber', allEntries: true },
  { component: 'bios', field: 'SerialNumber', allEntries: false },
  { component: 'motherboard', field: 'SerialNumber', allEntries: false },
  { component: 'system', field: 'UUID', allEntries: false },
];

// Vendor filler strings that identify nothing
const PLACEHOLDER_VALUES = new Set([
  'to be filled by o.e.m.',
  'default string',
  'system serial number',
  'none',
  'n/a',
  '0',
  '00000000-0000-0000-0000-000000000000',
]);

function lookupField(entry: Readonly<Record<string, string>>, field: string): string | null {
  const wanted = field.toLowerCase();
  for (const [key, value] of Object.entries(entry)) {
    if (key.toLowerCase() === wanted && typeof value === 'string') {
      const trimmed = value.trim();
      if (trimmed && !PLACEHOLDER_VALUES.has(trimmed.toLowerCase())) {
        return trimmed;
      }
    }
  }
  return null;
}

/**
 * Canonical values of a Snapshot, sorted so discovery order never matters
 */
export function extractCanonicalValues(snapshot: Snapshot): string[] {
  const values: string[] = [];

  for (const { component, field, allEntries } of CANONICAL_FIELDS) {
    const entries = componentEntries(snapshot.components[component]);
    for (const entry of allEntries ? entries : entries.slice(0, 1)) {
      const value = lookupField(entry, field);
      if (value !== null) {
        values.push(value);
      }
    }
  }

  return values.sort();
}

/**
 * Pure and total: missing or malformed fields only shrink the canonical set.
 * An empty set still hashes (the empty string) but is marked invalid
 */
export function computeFingerprint(snapshot: Snapshot): Fingerprint {
  const values = extractCanonicalValues(snapshot);
  const hash = createHash('sha256').update(values.join('|')).digest('hex');

  return {
    status: values.length > 0 ? 'valid' : 'invalid',
    hash,
    componentCount: values.length,
  };
}

export function shortHash(hash: string): string {
  return `${hash.slice(0, 8)}...`;
}

import { z } from 'zod';

/**
 * Snapshot entity - raw per-component hardware facts collected at one point in time
 * Immutable once created; components degrade to raw text when a query fails
 */
export type ComponentEntry = Readonly<Record<string, string>>;

export type ComponentRecord =
  | { readonly kind: 'structured'; readonly entries: readonly ComponentEntry[] }
  | { readonly kind: 'raw'; readonly text: string };

export interface Snapshot {
  readonly platform: string;
  readonly collectedAt: string; // ISO 8601
  readonly components: Readonly<Record<string, ComponentRecord>>;
}

const componentRecordSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('structured'),
    entries: z.array(z.record(z.string())),
  }),
  z.object({
    kind: z.literal('raw'),
    text: z.string(),
  }),
]);

export const snapshotSchema = z.object({
  platform: z.string(),
  collectedAt: z.string(),
  components: z.record(componentRecordSchema),
});

export function structured(...entries: Array<Record<string, string>>): ComponentRecord {
  return { kind: 'structured', entries };
}

export function raw(text: string): ComponentRecord {
  return { kind: 'raw', text };
}

function freezeComponent(record: ComponentRecord): ComponentRecord {
  if (record.kind === 'raw') {
    return Object.freeze({ kind: 'raw', text: record.text });
  }
  return Object.freeze({
    kind: 'structured',
    entries: Object.freeze(record.entries.map((entry) => Object.freeze({ ...entry }))),
  });
}

/**
 * Factory function to create a deep-frozen Snapshot
 * Copies its input so later mutation by the caller cannot leak in
 */
export function createSnapshot(params: {
  components: Record<string, ComponentRecord>;
  platform?: string;
  collectedAt?: string;
}): Snapshot {
  const components: Record<string, ComponentRecord> = {};
  for (const [name, record] of Object.entries(params.components)) {
    components[name] = freezeComponent(record);
  }

  return Object.freeze({
    platform: params.platform ?? process.platform,
    collectedAt: params.collectedAt ?? new Date().toISOString(),
    components: Object.freeze(components),
  });
}

/**
 * Rebuilds a Snapshot from persisted JSON; throws ZodError on malformed input
 */
export function parseSnapshot(value: unknown): Snapshot {
  return createSnapshot(snapshotSchema.parse(value));
}

/**
 * Parses "Key : Value" / "Key=Value" listings, one device instance per blank-line block
 */
export function parseKeyValueListing(text: string): ComponentEntry[] {
  if (!text || text.startsWith('Error:')) {
    return [];
  }

  const results: Array<Record<string, string>> = [];
  let current: Record<string, string> = {};

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (!line) {
      if (Object.keys(current).length > 0) {
        results.push(current);
        current = {};
      }
      continue;
    }

    let separator = line.indexOf(' : ');
    let width = 3;
    if (separator === -1) {
      separator = line.indexOf('=');
      width = 1;
    }
    if (separator <= 0) continue;

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + width).trim();
    if (key && value && value !== '{}') {
      current[key] = value;
    }
  }

  if (Object.keys(current).length > 0) {
    results.push(current);
  }

  return results;
}

/**
 * Entries of a component, parsing raw text when the query degraded
 */
export function componentEntries(record: ComponentRecord | undefined): readonly ComponentEntry[] {
  if (!record) return [];
  return record.kind === 'structured' ? record.entries : parseKeyValueListing(record.text);
}

import { describe, expect, it } from 'vitest';
import {
  computeFingerprint,
  extractCanonicalValues,
  shortHash,
} from '../../../src/services/FingerprintEngine.js';
import { createSnapshot, raw, structured } from '../../../src/domain/entities/Snapshot.js';
import { hostSnapshot } from '../support/fakes.js';

const EMPTY_SHA256 = 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';

describe('FingerprintEngine', () => {
  it('hashes the sorted canonical values joined with a pipe', () => {
    const snapshot = hostSnapshot({ disks: ['X1'], bios: 'B1' });

    expect(computeFingerprint(snapshot)).toEqual({
      status: 'valid',
      hash: '76ed87acbbac1960f4e50eb7c0538c8e3a29fe12ff6d3c5d3c31998b267dd563',
      componentCount: 2,
    });
  });

  it('does not depend on disk discovery order', () => {
    const first = hostSnapshot({ disks: ['D1', 'D2'], bios: 'S1', uuid: 'U1' });
    const second = hostSnapshot({ disks: ['D2', 'D1'], bios: 'S1', uuid: 'U1' });

    expect(computeFingerprint(first).hash).toBe(computeFingerprint(second).hash);
    expect(computeFingerprint(first).hash).toBe(
      'c8e6d5dacb4efbd987121c46406ddbcbec6881c9aae852ccf924bbe6a58b959f'
    );
  });

  it('ignores non-identifying components', () => {
    const base = hostSnapshot({ disks: ['D1'], bios: 'B1', board: 'M1', uuid: 'U1' });
    const withExtras = createSnapshot({
      components: {
        ...base.components,
        mac: structured({ Name: 'eth0', MacAddress: 'aa:bb:cc:dd:ee:ff' }),
        os: structured({ Hostname: 'box' }),
      },
    });

    expect(computeFingerprint(withExtras).hash).toBe(
      'bf295f2826544244ff4c55a9bde33ede174f0ee79e9e98c17f42560b328475ae'
    );
  });

  it('marks an empty canonical subset invalid', () => {
    const fingerprint = computeFingerprint(hostSnapshot({}));

    expect(fingerprint).toEqual({ status: 'invalid', hash: EMPTY_SHA256, componentCount: 0 });
  });

  it('drops vendor placeholder values and trims the rest', () => {
    const snapshot = createSnapshot({
      components: {
        disk: structured(
          { SerialNumber: 'N/A' },
          { SerialNumber: 'Default string' },
          { SerialNumber: 'none' },
          { SerialNumber: '0' },
          { SerialNumber: ' D1 ' }
        ),
        bios: structured({ SerialNumber: 'System Serial Number' }),
        motherboard: structured({ serialnumber: '  M1  ' }),
        system: structured({ UUID: '00000000-0000-0000-0000-000000000000' }),
      },
    });

    expect(extractCanonicalValues(snapshot)).toEqual(['D1', 'M1']);
  });

  it('reads identifiers out of raw listing text', () => {
    const snapshot = createSnapshot({
      components: {
        system: raw('Name : Box\nUUID : U1'),
      },
    });

    expect(extractCanonicalValues(snapshot)).toEqual(['U1']);
  });

  it('uses only the first entry of single-instance components', () => {
    const snapshot = createSnapshot({
      components: {
        motherboard: structured({ SerialNumber: 'M1' }, { SerialNumber: 'M2' }),
        disk: structured({ SerialNumber: 'D1' }, { SerialNumber: 'D2' }),
      },
    });

    expect(extractCanonicalValues(snapshot)).toEqual(['D1', 'D2', 'M1']);
  });

  it('shortens a hash for display', () => {
    expect(shortHash(EMPTY_SHA256)).toBe('e3b0c442...');
  });
});

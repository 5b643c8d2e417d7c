import { describe, expect, it } from 'vitest';
import { countPrivateTags, stripPrivateTags } from '../src/core/privateTagStripper';
import type { DicomElement } from '../src/core/types';

function sampleDict(): Record<string, DicomElement> {
  return {
    x00080060: { vr: 'CS', Value: 'CT' },
    x00090010: { vr: 'LO', Value: 'ACME 1.0' },
    x00091001: { vr: 'LO', Value: 'SERIAL-42' },
    x00081115: {
      vr: 'SQ',
      items: [
        {
          elements: {
            x0020000e: { vr: 'UI', Value: '1.2.3.1' },
            x00191001: { vr: 'UN', Value: new Uint8Array([1, 2]) },
          },
        },
      ],
    },
    x00281050: { vr: 'DS', Value: '40' },
  };
}

describe('stripPrivateTags', () => {
  it('removes private elements at every depth', () => {
    const stripped = stripPrivateTags(sampleDict());
    expect(Object.keys(stripped)).toEqual(['x00080060', 'x00081115', 'x00281050']);
    expect(stripped.x00081115.items).toEqual([{ elements: { x0020000e: { vr: 'UI', Value: '1.2.3.1' } } }]);
  });

  it('keeps public elements as the same objects', () => {
    const dict = sampleDict();
    const stripped = stripPrivateTags(dict);
    expect(stripped.x00080060).toBe(dict.x00080060);
    expect(stripped.x00081115).not.toBe(dict.x00081115);
  });

  it('does not modify its input', () => {
    const dict = sampleDict();
    stripPrivateTags(dict);
    expect(countPrivateTags(dict)).toBe(3);
  });

  it('is idempotent', () => {
    const once = stripPrivateTags(sampleDict());
    const twice = stripPrivateTags(once);
    expect(twice).toEqual(once);
    expect(countPrivateTags(twice)).toBe(0);
  });
});

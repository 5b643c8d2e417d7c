import { describe, expect, it } from 'vitest';
import { SafeDataView } from '../src/utils/SafeDataView';

describe('SafeDataView', () => {
  it('reads little-endian integers and enforces bounds', () => {
    const buffer = new ArrayBuffer(6);
    const view = new DataView(buffer);
    view.setUint16(0, 0x1234, true);
    view.setUint32(2, 0xdeadbeef, true);

    const safe = new SafeDataView(buffer);
    expect(safe.readUint16()).toBe(0x1234);
    expect(safe.readUint32()).toBe(0xdeadbeef);
    expect(safe.getPosition()).toBe(6);

    expect(() => safe.readUint16()).toThrow('Read beyond buffer');
    expect(() => safe.setPosition(-1)).toThrow('out of bounds');
  });

  it('reads tags and VR codes', () => {
    const bytes = new Uint8Array([0x10, 0x00, 0x20, 0x00, 0x4c, 0x4f]);
    const safe = new SafeDataView(bytes.buffer);
    expect(safe.readTag()).toEqual({ group: 0x0010, element: 0x0020 });
    expect(safe.readVR()).toBe('LO');
    expect(safe.getRemainingBytes()).toBe(0);
  });

  it('slices without moving the position', () => {
    const bytes = new Uint8Array([1, 2, 3, 4, 5]);
    const safe = new SafeDataView(bytes.buffer);
    safe.skip(1);
    expect(Array.from(safe.slice(1, 3))).toEqual([2, 3]);
    expect(safe.getPosition()).toBe(1);
    expect(() => safe.slice(2, 9)).toThrow('out of bounds');
  });
});

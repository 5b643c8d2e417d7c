import { describe, expect, it } from 'vitest';
import { cleanUid, generateUid, isValidUid, UidMappingTable } from '../src/core/uidMappingTable';

describe('UID generation', () => {
  it('produces 2.25 UUID-derived UIDs', () => {
    const uid = generateUid();
    expect(uid.startsWith('2.25.')).toBe(true);
    expect(uid.length).toBeLessThanOrEqual(64);
    expect(isValidUid(uid)).toBe(true);
  });

  it('produces a different UID each time', () => {
    const uids = new Set(Array.from({ length: 50 }, () => generateUid()));
    expect(uids.size).toBe(50);
  });
});

describe('UID syntax', () => {
  it('accepts dotted numeric components', () => {
    expect(isValidUid('1.2.840.10008.1.2.1')).toBe(true);
    expect(isValidUid('1.2.0.3')).toBe(true);
  });

  it('rejects malformed UIDs', () => {
    expect(isValidUid('')).toBe(false);
    expect(isValidUid('1.2.03')).toBe(false);
    expect(isValidUid('1..2')).toBe(false);
    expect(isValidUid('1.2.abc')).toBe(false);
    expect(isValidUid(`1.${'2'.repeat(63)}`)).toBe(false);
  });

  it('strips on-disk padding', () => {
    expect(cleanUid('1.2.3\0')).toBe('1.2.3');
    expect(cleanUid('1.2.3 ')).toBe('1.2.3');
  });
});

describe('UidMappingTable', () => {
  it('returns the same new UID for repeated originals', () => {
    const table = new UidMappingTable();
    const first = table.resolve('1.2.3');
    expect(first).not.toBe('1.2.3');
    expect(table.resolve('1.2.3')).toBe(first);
    expect(table.resolve('1.2.3\0')).toBe(first);
    expect(table.size).toBe(1);
  });

  it('maps distinct originals to distinct UIDs', () => {
    const table = new UidMappingTable();
    expect(table.resolve('1.2.3')).not.toBe(table.resolve('1.2.4'));
    expect(table.entries().map(([original]) => original)).toEqual(['1.2.3', '1.2.4']);
  });

  it('is independent across runs', () => {
    const first = new UidMappingTable().resolve('1.2.3');
    const second = new UidMappingTable().resolve('1.2.3');
    expect(first).not.toBe(second);
  });

  it('retries a generator that repeats an issued UID', () => {
    const outputs = ['2.25.1', '2.25.1', '2.25.2'];
    const table = new UidMappingTable(() => outputs.shift() ?? '2.25.9');
    expect(table.resolve('1.1')).toBe('2.25.1');
    expect(table.resolve('1.2')).toBe('2.25.2');
  });

  it('refuses invalid generated UIDs', () => {
    const table = new UidMappingTable(() => 'not-a-uid');
    expect(() => table.resolve('1.2.3')).toThrow('invalid UID');
    expect(table.has('1.2.3')).toBe(false);
  });

  it('keeps one mapping under concurrent resolution', async () => {
    const table = new UidMappingTable();
    const results = await Promise.all(
      Array.from({ length: 20 }, async (_, i) => {
        await new Promise((resolve) => setTimeout(resolve, i % 3));
        return table.resolve('1.2.840.99');
      })
    );
    expect(new Set(results).size).toBe(1);
    expect(table.size).toBe(1);
  });
});

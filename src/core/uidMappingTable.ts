/**
 * UID Mapping Table
 *
 * Maps original UIDs to freshly generated ones for the lifetime of one batch
 * run, so that every occurrence of a Study/Series/SOP Instance UID across the
 * batch resolves to the same new value.
 *
 * `resolve` is synchronous and performs no I/O: under Node's event loop the
 * lookup and the insert can never interleave with another worker's call.
 */

import { v4 as uuidv4 } from 'uuid';

/** Root for UUID-derived UIDs (ISO/IEC 9834-8, PS3.5 Annex B.2) */
export const UUID_UID_ROOT = '2.25';

export const MAX_UID_LENGTH = 64;

const UID_PATTERN = /^(0|[1-9][0-9]*)(\.(0|[1-9][0-9]*))*$/;

export type UidGenerator = () => string;

/**
 * Generate a `2.25.<decimal UUID>` UID from a random (v4) UUID.
 */
export function generateUid(): string {
  const hex = uuidv4().replace(/-/g, '');
  return `${UUID_UID_ROOT}.${BigInt(`0x${hex}`).toString(10)}`;
}

/**
 * Syntactic UID check: dot-separated numeric components without leading
 * zeros, at most 64 characters.
 */
export function isValidUid(uid: string): boolean {
  return uid.length > 0 && uid.length <= MAX_UID_LENGTH && UID_PATTERN.test(uid);
}

/**
 * Strip the NUL/space padding a UI value may carry on disk.
 */
export function cleanUid(uid: string): string {
  return uid.replace(/[\0\s]+$/g, '').trim();
}

const MAX_GENERATION_ATTEMPTS = 16;

export class UidMappingTable {
  private readonly mapping = new Map<string, string>();
  private readonly issued = new Set<string>();

  constructor(private readonly generator: UidGenerator = generateUid) {}

  /**
   * New UID for `originalUid`, created on first encounter and reused after.
   */
  resolve(originalUid: string): string {
    const key = cleanUid(originalUid);
    const existing = this.mapping.get(key);
    if (existing !== undefined) {
      return existing;
    }
    const created = this.createUnique();
    this.mapping.set(key, created);
    this.issued.add(created);
    return created;
  }

  has(originalUid: string): boolean {
    return this.mapping.has(cleanUid(originalUid));
  }

  get size(): number {
    return this.mapping.size;
  }

  entries(): Array<[original: string, replacement: string]> {
    return [...this.mapping.entries()];
  }

  private createUnique(): string {
    for (let attempt = 0; attempt < MAX_GENERATION_ATTEMPTS; attempt++) {
      const candidate = this.generator();
      if (!isValidUid(candidate)) {
        throw new Error(`UID generator produced an invalid UID: ${candidate}`);
      }
      if (!this.issued.has(candidate)) {
        return candidate;
      }
    }
    throw new Error('UID generator keeps producing UIDs that are already in use');
  }
}

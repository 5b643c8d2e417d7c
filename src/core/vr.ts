/**
 * Value Representation model
 *
 * The anonymization policy dispatches over a closed set of VR kinds. Any VR
 * code outside the DICOM-defined list is reported as `unrecognized` so that
 * callers handle it explicitly.
 */

export const KNOWN_VRS = [
  'AE', 'AS', 'AT', 'CS', 'DA', 'DS', 'DT', 'FD', 'FL', 'IS', 'LO', 'LT',
  'OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'PN', 'SH', 'SL', 'SQ', 'SS', 'ST',
  'SV', 'TM', 'UC', 'UI', 'UL', 'UN', 'UR', 'US', 'UT', 'UV',
] as const;

export type Vr = (typeof KNOWN_VRS)[number];

const KNOWN_VR_SET: ReadonlySet<string> = new Set(KNOWN_VRS);

export function isKnownVr(code: string): code is Vr {
  return KNOWN_VR_SET.has(code);
}

/**
 * Anonymization class of a VR.
 */
export type VrKind =
  | { kind: 'text'; vr: 'PN' | 'SH' | 'LO' | 'LT' | 'ST' }
  | { kind: 'date'; vr: 'DA' }
  | { kind: 'time'; vr: 'TM' }
  | { kind: 'uid'; vr: 'UI' }
  | { kind: 'numericString'; vr: 'DS' | 'IS' }
  | { kind: 'sequence'; vr: 'SQ' }
  | { kind: 'other'; vr: Vr }
  | { kind: 'unrecognized'; code: string };

export function classifyVr(code: string): VrKind {
  const vr = code.trim().toUpperCase();
  if (!isKnownVr(vr)) {
    return { kind: 'unrecognized', code };
  }
  switch (vr) {
    case 'PN':
    case 'SH':
    case 'LO':
    case 'LT':
    case 'ST':
      return { kind: 'text', vr };
    case 'DA':
      return { kind: 'date', vr };
    case 'TM':
      return { kind: 'time', vr };
    case 'UI':
      return { kind: 'uid', vr };
    case 'DS':
    case 'IS':
      return { kind: 'numericString', vr };
    case 'SQ':
      return { kind: 'sequence', vr };
    default:
      return { kind: 'other', vr };
  }
}

/**
 * VRs that use 32-bit length (Explicit VR)
 */
const LONG_VRS: ReadonlySet<string> = new Set([
  'OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'SQ', 'SV', 'UC', 'UN', 'UR', 'UT', 'UV',
]);

export function requiresExplicitLength(vr: string): boolean {
  return LONG_VRS.has(vr);
}

/**
 * VRs padded with a trailing space (0x20); UI and binary VRs pad with 0x00.
 */
const SPACE_PADDED_VRS: ReadonlySet<string> = new Set([
  'AE', 'AS', 'CS', 'DA', 'DS', 'DT', 'IS', 'LO', 'LT', 'PN', 'SH', 'ST',
  'TM', 'UC', 'UR', 'UT',
]);

export function paddingByte(vr: string): number {
  return SPACE_PADDED_VRS.has(vr) ? 0x20 : 0x00;
}

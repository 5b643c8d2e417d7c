import { describe, expect, it } from 'vitest';
import { detectVR } from '../src/utils/vrDetection';
import { classifyVr, isKnownVr, paddingByte, requiresExplicitLength } from '../src/core/vr';

describe('VR detection for implicit VR files', () => {
  it('uses the catalog VR for catalog tags', () => {
    expect(detectVR(0x0010, 0x0010)).toBe('PN');
    expect(detectVR(0x0008, 0x0081)).toBe('ST');
    expect(detectVR(0x0010, 0x1002)).toBe('SQ');
  });

  it('uses the dictionary for other standard tags', () => {
    expect(detectVR(0x0028, 0x0010)).toBe('US');
    expect(detectVR(0x0008, 0x1140)).toBe('SQ');
    expect(detectVR(0x7fe0, 0x0010)).toBe('OW');
  });

  it('applies structural rules and falls back to UN', () => {
    expect(detectVR(0x0018, 0x0000)).toBe('UL');
    expect(detectVR(0x0009, 0x0010)).toBe('LO');
    expect(detectVR(0x0009, 0x1001)).toBe('UN');
    expect(detectVR(0x0040, 0xa123)).toBe('UN');
  });
});

describe('VR model', () => {
  it('classifies VRs into anonymization kinds', () => {
    expect(classifyVr('PN')).toEqual({ kind: 'text', vr: 'PN' });
    expect(classifyVr('da')).toEqual({ kind: 'date', vr: 'DA' });
    expect(classifyVr('TM')).toEqual({ kind: 'time', vr: 'TM' });
    expect(classifyVr('UI')).toEqual({ kind: 'uid', vr: 'UI' });
    expect(classifyVr('IS')).toEqual({ kind: 'numericString', vr: 'IS' });
    expect(classifyVr('SQ')).toEqual({ kind: 'sequence', vr: 'SQ' });
    expect(classifyVr('CS')).toEqual({ kind: 'other', vr: 'CS' });
    expect(classifyVr('ZZ')).toEqual({ kind: 'unrecognized', code: 'ZZ' });
  });

  it('knows length and padding rules', () => {
    expect(isKnownVr('OB')).toBe(true);
    expect(isKnownVr('XX')).toBe(false);
    expect(requiresExplicitLength('SQ')).toBe(true);
    expect(requiresExplicitLength('LO')).toBe(false);
    expect(paddingByte('PN')).toBe(0x20);
    expect(paddingByte('UI')).toBe(0x00);
  });
});

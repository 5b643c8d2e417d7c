import { describe, expect, it } from 'vitest';
import {
  ANONYMIZED_DATE,
  ANONYMIZED_NUMBER,
  ANONYMIZED_TEXT,
  ANONYMIZED_TIME,
  transformElement,
  type TransformContext,
} from '../src/core/elementTransformer';
import { TagSelection } from '../src/core/tagSelection';
import { UidMappingTable } from '../src/core/uidMappingTable';

const encoder = new TextEncoder();

function context(selection: TagSelection = TagSelection.all()): TransformContext {
  return { selection, uidTable: new UidMappingTable() };
}

describe('transformElement', () => {
  describe('text, date, time and numeric values', () => {
    it('replaces person names', () => {
      const outcome = transformElement('x00100010', { vr: 'PN', Value: 'DOE^JOHN' }, context());
      expect(outcome).toEqual({ kind: 'replace', element: { vr: 'PN', Value: ANONYMIZED_TEXT } });
    });

    it('replaces values read as raw bytes', () => {
      const outcome = transformElement('x00100020', { vr: 'LO', Value: encoder.encode('PID-001 ') }, context());
      expect(outcome).toEqual({ kind: 'replace', element: { vr: 'LO', Value: 'ANONYMIZED' } });
    });

    it('replaces dates and times with fixed values', () => {
      expect(transformElement('x00080020', { vr: 'DA', Value: '20240315' }, context())).toEqual({
        kind: 'replace',
        element: { vr: 'DA', Value: ANONYMIZED_DATE },
      });
      expect(transformElement('x00080030', { vr: 'TM', Value: '101530' }, context())).toEqual({
        kind: 'replace',
        element: { vr: 'TM', Value: ANONYMIZED_TIME },
      });
    });

    it('replaces numeric strings with zero', () => {
      expect(transformElement('x00101020', { vr: 'DS', Value: '1.82' }, context())).toEqual({
        kind: 'replace',
        element: { vr: 'DS', Value: ANONYMIZED_NUMBER },
      });
    });

    it('blanks other VRs', () => {
      expect(transformElement('x00101010', { vr: 'AS', Value: '045Y' }, context())).toEqual({
        kind: 'replace',
        element: { vr: 'AS', Value: '' },
      });
      expect(transformElement('x00101010', { vr: 'AS', Value: encoder.encode('045Y') }, context())).toEqual({
        kind: 'replace',
        element: { vr: 'AS', Value: new Uint8Array(0) },
      });
    });

    it('leaves empty values empty', () => {
      expect(transformElement('x00100010', { vr: 'PN', Value: '' }, context())).toEqual({ kind: 'keep' });
      expect(transformElement('x00080020', { vr: 'DA', Value: new Uint8Array(0) }, context())).toEqual({ kind: 'keep' });
      expect(transformElement('x00101020', { vr: 'DS' }, context())).toEqual({ kind: 'keep' });
      expect(transformElement('x0020000d', { vr: 'UI', Value: '\0\0' }, context())).toEqual({ kind: 'keep' });
    });
  });

  describe('UIDs', () => {
    it('remaps through the shared table', () => {
      const ctx = context();
      const first = transformElement('x0020000d', { vr: 'UI', Value: encoder.encode('1.2.3\0') }, ctx);
      const second = transformElement('x0020000d', { vr: 'UI', Value: '1.2.3' }, ctx);
      expect(first.kind).toBe('replace');
      expect(second).toEqual(first);
      expect(first).toEqual({ kind: 'replace', element: { vr: 'UI', Value: ctx.uidTable.resolve('1.2.3') } });
    });

    it('remaps each value of a multi-valued UID', () => {
      const ctx = context();
      const outcome = transformElement('x00200052', { vr: 'UI', Value: '1.2.3\\1.2.4' }, ctx);
      expect(outcome).toEqual({
        kind: 'replace',
        element: { vr: 'UI', Value: [ctx.uidTable.resolve('1.2.3'), ctx.uidTable.resolve('1.2.4')] },
      });
    });

    it('blanks and reports malformed UIDs', () => {
      const ctx = context();
      const outcome = transformElement('x00080018', { vr: 'UI', Value: '1.2.abc' }, ctx);
      expect(outcome).toEqual({
        kind: 'skipped',
        element: { vr: 'UI', Value: '' },
        skipped: { tag: 'x00080018', vr: 'UI', reason: 'malformed UID "1.2.abc", value blanked' },
      });
      expect(ctx.uidTable.size).toBe(0);
    });
  });

  describe('VR resolution', () => {
    it('uses the catalog VR for UN elements', () => {
      const outcome = transformElement('x00100010', { vr: 'UN', Value: encoder.encode('DOE^JOHN') }, context());
      expect(outcome).toEqual({ kind: 'replace', element: { vr: 'PN', Value: ANONYMIZED_TEXT } });
    });

    it('uses the catalog VR when no VR is given', () => {
      const outcome = transformElement('x00080020', { vr: '', Value: '20240315' }, context());
      expect(outcome).toEqual({ kind: 'replace', element: { vr: 'DA', Value: ANONYMIZED_DATE } });
    });

    it('blanks and reports unrecognized VRs', () => {
      const outcome = transformElement('x00100010', { vr: 'ZZ', Value: 'DOE^JOHN' }, context());
      expect(outcome).toEqual({
        kind: 'skipped',
        element: { vr: 'ZZ', Value: '' },
        skipped: { tag: 'x00100010', vr: 'ZZ', reason: 'unrecognized VR "ZZ", value blanked' },
      });
    });
  });

  describe('selection', () => {
    it('removes private tags whatever the selection', () => {
      expect(transformElement('x00091001', { vr: 'LO', Value: 'VENDOR' }, context(TagSelection.of([])))).toEqual({
        kind: 'remove',
      });
    });

    it('keeps tags outside the catalog', () => {
      expect(transformElement('x00280010', { vr: 'US', Value: new Uint8Array([2, 0]) }, context())).toEqual({
        kind: 'keep',
      });
    });

    it('keeps catalog tags that are not selected', () => {
      const selection = TagSelection.of(['PatientID']);
      expect(transformElement('x00100010', { vr: 'PN', Value: 'DOE^JOHN' }, context(selection))).toEqual({
        kind: 'keep',
      });
    });

    it('empties selected sequences', () => {
      const element = {
        vr: 'SQ',
        items: [{ elements: { x00100020: { vr: 'LO', Value: 'OTHER-ID' } } }],
      };
      expect(transformElement('x00101002', element, context())).toEqual({
        kind: 'replace',
        element: { vr: 'SQ', items: [] },
      });
    });

    it('does not mutate the input element', () => {
      const element = { vr: 'PN', Value: 'DOE^JOHN' };
      transformElement('x00100010', element, context());
      expect(element).toEqual({ vr: 'PN', Value: 'DOE^JOHN' });
    });
  });
});

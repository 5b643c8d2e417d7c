import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../src/core/errors';
import { DEFAULT_CATALOG } from '../src/core/tagCatalog';
import { TagSelection } from '../src/core/tagSelection';

describe('Tag Selection', () => {
  it('selects every catalog tag by default', () => {
    const selection = TagSelection.all();
    expect(selection.size).toBe(DEFAULT_CATALOG.size);
    expect(selection.has('0010,0010')).toBe(true);
    expect(selection.has('x00280010')).toBe(false);
  });

  it('accepts tags in any format and keywords', () => {
    const selection = TagSelection.of(['(0010,0010)', 'StudyInstanceUID', 'x00080018']);
    expect(selection.toArray()).toEqual(['x00080018', 'x00100010', 'x0020000d']);
  });

  it('rejects identifiers outside the catalog', () => {
    expect(() => TagSelection.of(['0028,0010'])).toThrow(ConfigurationError);
    expect(() => TagSelection.of(['0028,0010'])).toThrow('Tag (0028,0010) is not in the anonymization catalog');
    expect(() => TagSelection.of(['Rows'])).toThrow('Tag "Rows" is not in the anonymization catalog');
  });

  it('removes excluded tags without changing the original', () => {
    const all = TagSelection.all();
    const reduced = all.without(['PatientName', '0008,0018']);
    expect(reduced.has('x00100010')).toBe(false);
    expect(reduced.has('x00080018')).toBe(false);
    expect(reduced.size).toBe(all.size - 2);
    expect(all.has('x00100010')).toBe(true);
  });

  it('reports an empty selection', () => {
    expect(TagSelection.of([]).isEmpty).toBe(true);
  });
});

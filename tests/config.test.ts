import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfigFile, parseConfig, selectionFromConfig } from '../src/config';
import { ConfigurationError } from '../src/core/errors';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({})).toEqual({ tags: 'all', exclude: [], concurrency: 4 });
  });

  it('accepts a tag list', () => {
    expect(parseConfig({ tags: ['PatientName', '0010,0020'], concurrency: 8 })).toEqual({
      tags: ['PatientName', '0010,0020'],
      exclude: [],
      concurrency: 8,
    });
  });

  it('rejects out-of-range concurrency', () => {
    expect(() => parseConfig({ concurrency: 0 })).toThrow(ConfigurationError);
    expect(() => parseConfig({ concurrency: 0 })).toThrow(
      'Invalid configuration: concurrency: Number must be greater than or equal to 1'
    );
    expect(() => parseConfig({ concurrency: 65 })).toThrow('concurrency: Number must be less than or equal to 64');
  });

  it('rejects unknown keys', () => {
    expect(() => parseConfig({ keepPrivate: true })).toThrow("(root): Unrecognized key(s) in object: 'keepPrivate'");
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'dicom-anonymizer-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads and validates a JSON file', async () => {
    const file = path.join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ exclude: ['StudyDate'], concurrency: 2 }));
    await expect(loadConfigFile(file)).resolves.toEqual({ tags: 'all', exclude: ['StudyDate'], concurrency: 2 });
  });

  it('rejects invalid JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ "tags": ');
    await expect(loadConfigFile(file)).rejects.toThrow(`Configuration file ${file} is not valid JSON`);
  });

  it('rejects a missing file', async () => {
    const file = path.join(dir, 'missing.json');
    await expect(loadConfigFile(file)).rejects.toThrow(`Cannot read configuration file ${file}`);
  });
});

describe('selectionFromConfig', () => {
  it('selects every catalog tag for "all"', () => {
    expect(selectionFromConfig(parseConfig({})).size).toBe(42);
  });

  it('applies exclusions to the listed tags', () => {
    const selection = selectionFromConfig(parseConfig({ tags: ['PatientName', 'PatientID'], exclude: ['0010,0020'] }));
    expect(selection.toArray()).toEqual(['x00100010']);
  });

  it('rejects an empty selection', () => {
    expect(() => selectionFromConfig(parseConfig({ tags: ['PatientName'], exclude: ['PatientName'] }))).toThrow(
      'No tags selected for anonymization'
    );
  });

  it('rejects tags outside the catalog', () => {
    expect(() => selectionFromConfig(parseConfig({ tags: ['Rows'] }))).toThrow(ConfigurationError);
  });
});

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { parseReconcileConfig } from '@corpledger/protocol';
import { buildOptionsFromConfig, createSourceBatches, loadReconcileConfig } from './config.js';
import { ConfigurationError, ValidationError } from './errors.js';

// --- Test Fixtures ---

const validConfig = {
  sources: [
    {
      tag: 'stateA',
      mapping: {
        identifier: 'CIN',
        fields: { name: 'CompanyName', status: ['CompanyStatus', 'Status'] },
        fixed: { jurisdiction: 'StateA' },
      },
    },
    {
      tag: 'stateB',
      mapping: { identifier: ['CIN'], fields: { name: 'Name' }, textCase: 'upper' },
    },
  ],
  sourcePriority: ['stateA', 'stateB'],
};

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'corpledger-config-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

// --- Tests ---

describe('loadReconcileConfig', () => {
  it('reads, validates and applies defaults', async () => {
    const path = join(dir, 'valid.json');
    await writeFile(path, JSON.stringify(validConfig), 'utf-8');

    const config = await loadReconcileConfig(path);

    expect(config.sources[0].mapping.identifier).toEqual(['CIN']);
    expect(config.sources[0].mapping.fields.name).toEqual(['CompanyName']);
    expect(config.sources[0].mapping.textCase).toBe('preserve');
    expect(config.sources[1].mapping.textCase).toBe('upper');
    expect(config.strict).toBe(false);
    expect(config.identityFields).toEqual(['registrationDate']);
    expect(config.maxWarnings).toBe(1000);
  });

  it('reports a missing file', async () => {
    const path = join(dir, 'absent.json');

    await expect(loadReconcileConfig(path)).rejects.toThrow(
      new ConfigurationError(path, 'file not found')
    );
  });

  it('reports malformed JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "sources": [', 'utf-8');

    await expect(loadReconcileConfig(path)).rejects.toThrow(/malformed JSON/);
  });

  it('lists validation issues', async () => {
    const path = join(dir, 'invalid.json');
    await writeFile(path, JSON.stringify({ ...validConfig, sourcePriority: ['stateA'] }), 'utf-8');

    const error = await loadReconcileConfig(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe(`Invalid config "${path}": 1 validation error(s)`);
    expect(error.issues).toEqual(['sourcePriority: Source "stateB" is missing from sourcePriority']);
  });

  it('reports the path of a bad value', async () => {
    const path = join(dir, 'negative.json');
    await writeFile(path, JSON.stringify({ ...validConfig, maxWarnings: -1 }), 'utf-8');

    const error = await loadReconcileConfig(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    if (!(error instanceof ConfigurationError)) return;
    expect(error.issues).toEqual(['maxWarnings: Number must be greater than or equal to 0']);
  });
});

describe('createSourceBatches', () => {
  const config = parseReconcileConfig(validConfig);

  it('pairs each source with its rows', () => {
    const rowsA = [{ CIN: 'ID1' }];
    const rowsB = [{ CIN: 'ID2' }];

    const batches = createSourceBatches(config, { stateB: rowsB, stateA: rowsA });

    expect(batches.map((b) => [b.sourceTag, b.records])).toEqual([
      ['stateA', rowsA],
      ['stateB', rowsB],
    ]);
    expect(batches[0].mapping).toBe(config.sources[0].mapping);
  });

  it('rejects rows for an unknown source', () => {
    expect(() => createSourceBatches(config, { stateA: [], stateB: [], stateC: [] })).toThrow(
      'Rows supplied for unknown source "stateC"'
    );
  });

  it('rejects a configured source without rows', () => {
    expect(() => createSourceBatches(config, { stateA: [] })).toThrow(ValidationError);
  });
});

describe('buildOptionsFromConfig', () => {
  it('carries the dedup policy and priority', () => {
    const config = parseReconcileConfig({ ...validConfig, strict: true, dateToleranceDays: 3 });

    expect(buildOptionsFromConfig(config, '2024-06-01')).toEqual({
      timestamp: '2024-06-01',
      sourcePriority: ['stateA', 'stateB'],
      strict: true,
      identityFields: ['registrationDate'],
      dateToleranceDays: 3,
      numericTolerance: 0,
      maxWarnings: 1000,
      logger: undefined,
    });
  });

  it('defaults the priority to source order', () => {
    const config = parseReconcileConfig({ sources: validConfig.sources });

    expect(buildOptionsFromConfig(config, '2024-06-01').sourcePriority).toEqual(['stateA', 'stateB']);
  });
});

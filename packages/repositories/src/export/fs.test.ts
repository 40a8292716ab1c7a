import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createFilesystemReader, createFilesystemWriter } from './fs.js';

let dir: string;

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), 'corpledger-export-'));
});

afterAll(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('filesystem writer and reader', () => {
  it('creates parent directories and reads files back', async () => {
    const writer = createFilesystemWriter();
    const reader = createFilesystemReader();
    const filePath = join(dir, 'change-logs', 'changes_a_b.ndjson');

    expect(await writer.exists(filePath)).toBe(false);
    await writer.writeFile(filePath, '{"a":1}\n');

    expect(await writer.exists(filePath)).toBe(true);
    expect(await readFile(filePath, 'utf-8')).toBe('{"a":1}\n');
    expect(await reader.readFile(filePath)).toBe('{"a":1}\n');
    expect(await reader.listDirectory(join(dir, 'change-logs'))).toEqual(['changes_a_b.ndjson']);
  });

  it('reports missing paths', async () => {
    expect(await createFilesystemReader().exists(join(dir, 'nothing-here'))).toBe(false);
  });
});

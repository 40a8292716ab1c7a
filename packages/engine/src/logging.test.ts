import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, createCapturingLogger, silentLogger } from './logging.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('createCapturingLogger', () => {
  it('records entries with level, message and data', () => {
    const logger = createCapturingLogger();

    logger.info('Snapshot saved', { entityCount: 2 });
    logger.warn('Conflict');

    expect(logger.entries.map(({ level, message, data }) => ({ level, message, data }))).toEqual([
      { level: 'info', message: 'Snapshot saved', data: { entityCount: 2 } },
      { level: 'warn', message: 'Conflict', data: undefined },
    ]);
  });
});

describe('consoleLogger', () => {
  it('prefixes messages with their level', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    consoleLogger.warn('Conflict', { identifier: 'ID1' });

    expect(spy).toHaveBeenCalledWith('[WARN] Conflict', { identifier: 'ID1' });
  });
});

describe('silentLogger', () => {
  it('writes nothing', () => {
    const spy = vi.spyOn(console, 'info').mockImplementation(() => {});

    silentLogger.info('ignored');

    expect(spy).not.toHaveBeenCalled();
  });
});

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, readFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { logger, logAppError, logStartup, formatLogEntry, getLogFilePath } from './logger.js';

describe('logger', () => {
  const TEST_DIR = join(tmpdir(), 'boxfall-logger-test-' + Date.now());
  const previousDir = process.env.BOXFALL_LOG_DIR;

  beforeEach(() => {
    process.env.BOXFALL_LOG_DIR = TEST_DIR;
  });

  afterEach(() => {
    if (previousDir === undefined) {
      delete process.env.BOXFALL_LOG_DIR;
    } else {
      process.env.BOXFALL_LOG_DIR = previousDir;
    }
    rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('should format entries with level and data', () => {
    const line = formatLogEntry({
      timestamp: '2024-01-02T03:04:05.000Z',
      level: 'warn',
      message: 'Glyph fallback',
      data: { mode: 'fallback' },
    });
    expect(line).toBe('[2024-01-02T03:04:05.000Z] [WARN] Glyph fallback {"mode":"fallback"}\n');
  });

  it('should omit data when there is none', () => {
    const line = formatLogEntry({ timestamp: 't', level: 'info', message: 'hi' });
    expect(line).toBe('[t] [INFO] hi\n');
  });

  it('should name the file after the day', () => {
    const path = getLogFilePath(new Date('2024-05-06T12:00:00Z'));
    expect(path).toBe(join(TEST_DIR, 'boxfall-2024-05-06.log'));
  });

  it('should create the directory lazily and append lines', () => {
    expect(existsSync(TEST_DIR)).toBe(false);

    logger.info('first');
    logger.debug('second', { n: 2 });

    const lines = readFileSync(getLogFilePath(), 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/\[INFO\] first$/);
    expect(lines[1]).toMatch(/\[DEBUG\] second \{"n":2\}$/);
  });

  it('should log startup and errors', () => {
    logStartup('1.2.3');
    logAppError(new Error('bad flag'), 'cli');

    const content = readFileSync(getLogFilePath(), 'utf-8');
    expect(content).toContain('[INFO] Application started {"version":"1.2.3"}');
    expect(content).toContain('"context":"cli","name":"Error","message":"bad flag"');
  });
});

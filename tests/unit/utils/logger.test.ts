/**
 * Unit tests for Logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Logger } from '@/shared/utils/logger.js';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

describe('Logger', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'whois-tools-logger-test-'));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should default to the info level', () => {
    expect(new Logger().level).toBe('info');
  });

  it('should apply the configured level', () => {
    const logger = new Logger();
    logger.setSilent(true);

    logger.configure({ level: 'debug', fileLogging: false, logDir: join(testDir, 'logs') });

    expect(logger.level).toBe('debug');
    expect(existsSync(join(testDir, 'logs'))).toBe(false);
  });

  it('should create the log directory when file logging is enabled', () => {
    const logger = new Logger();
    logger.setSilent(true);
    const logDir = join(testDir, '.whois-tools/logs');

    logger.configure({ level: 'info', fileLogging: true, logDir });

    expect(existsSync(logDir)).toBe(true);
  });

  it('should fall back to console logging when the directory cannot be created', async () => {
    const blocker = join(testDir, 'not-a-directory');
    await writeFile(blocker, 'file');
    const logger = new Logger();
    logger.setSilent(true);
    const warn = vi.spyOn(logger, 'warn');

    expect(() =>
      logger.configure({ level: 'info', fileLogging: true, logDir: join(blocker, 'logs') })
    ).not.toThrow();

    expect(warn).toHaveBeenCalledWith(
      'Failed to create log directory, file logging disabled',
      expect.objectContaining({ logDir: join(blocker, 'logs') })
    );
    expect(() => logger.info('Still logging')).not.toThrow();
  });

  it('should accept metadata objects', () => {
    const logger = new Logger();
    logger.setSilent(true);

    expect(() => logger.info('Lookup finished', { domain: 'example-test.com' })).not.toThrow();
    expect(() => logger.error('Lookup failed', { status: 500 })).not.toThrow();
  });
});

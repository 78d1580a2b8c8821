import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConsoleLogger, type Logger, RedactingLogger, SilentLogger } from './logger.ts';
import { Redactor } from './redactor.ts';

describe('ConsoleLogger', () => {
  const originalDebug = process.env.DEBUG;
  const originalVerbose = process.env.VERBOSE;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    delete process.env.DEBUG;
    delete process.env.VERBOSE;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    if (originalDebug !== undefined) process.env.DEBUG = originalDebug;
    if (originalVerbose !== undefined) process.env.VERBOSE = originalVerbose;
  });

  it('writes to console methods', () => {
    const logger = new ConsoleLogger();
    logger.log('log');
    logger.warn('warn');
    logger.error('error');
    logger.info('info');

    expect(console.log).toHaveBeenCalledWith('log');
    expect(console.warn).toHaveBeenCalledWith('warn');
    expect(console.error).toHaveBeenCalledWith('error');
    expect(console.info).toHaveBeenCalledWith('info');
  });

  it('only writes debug output when DEBUG or VERBOSE is set', () => {
    const logger = new ConsoleLogger();
    logger.debug('hidden');
    expect(console.debug).not.toHaveBeenCalled();

    process.env.VERBOSE = '1';
    logger.debug('shown');
    expect(console.debug).toHaveBeenCalledWith('shown');
  });
});

describe('RedactingLogger', () => {
  it('masks secrets before delegating', () => {
    const inner: Logger = new SilentLogger();
    const warn = vi.spyOn(inner, 'warn');
    const logger = new RedactingLogger(inner, new Redactor({ API_TOKEN: 'test-secret' }));

    logger.warn('token is test-secret');
    expect(warn).toHaveBeenCalledWith('token is ***REDACTED***');
  });
});

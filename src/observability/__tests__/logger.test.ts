// ═══════════════════════════════════════════════════════════════════════════════
// LOGGER TESTS — Levels, Formats, Child Context, Sinks
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadTestConfig } from '../../config/index.js';
import { AddressDescriptor } from '../../net/address/descriptor.js';
import {
  getLogger,
  loggers,
  resetLogger,
  setLogSink,
  type LogLevel,
} from '../logging/logger.js';

interface Captured {
  readonly level: LogLevel;
  readonly line: string;
}

let captured: Captured[] = [];

function entries(): unknown[] {
  return captured.map(({ line }): unknown => JSON.parse(line));
}

beforeEach(() => {
  captured = [];
  loadTestConfig({ logging: { enabled: true, level: 'debug', pretty: false } });
  setLogSink((level, line) => {
    captured.push({ level, line });
  });
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ─────────────────────────────────────────────────────────────────────────────────
// JSON OUTPUT
// ─────────────────────────────────────────────────────────────────────────────────

describe('Logger JSON output', () => {
  it('should write structured entries', () => {
    getLogger({ component: 'codec' }).info('Decoded record', { length: 30 });

    expect(captured).toHaveLength(1);
    expect(captured[0]?.level).toBe('info');
    expect(entries()[0]).toMatchObject({
      level: 'info',
      levelNum: 30,
      msg: 'Decoded record',
      service: 'ifaddr',
      component: 'codec',
      length: 30,
    });
  });

  it('should omit the component on the root logger', () => {
    getLogger().warn('Root message');
    expect(entries()[0]).not.toHaveProperty('component');
  });

  it('should flatten errors into the entry', () => {
    const cause = new Error('inner');
    getLogger().error('Failed', new Error('outer', { cause }), { attempt: 2 });

    expect(entries()[0]).toMatchObject({
      level: 'error',
      msg: 'Failed',
      attempt: 2,
      errorName: 'Error',
      errorMessage: 'outer',
      errorCause: 'Error: inner',
    });
  });

  it('should stringify non-Error values', () => {
    getLogger().fatal('Crashed', 'disk full');
    expect(entries()[0]).toMatchObject({ level: 'fatal', errorMessage: 'disk full' });
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// LEVELS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Logger levels', () => {
  it('should drop entries below the configured level', () => {
    const logger = getLogger();
    logger.trace('hidden');
    logger.debug('shown');
    expect(captured.map(({ level }) => level)).toEqual(['debug']);
  });

  it('should follow config changes on existing loggers', () => {
    const logger = getLogger({ component: 'address' });
    expect(logger.isLevelEnabled('debug')).toBe(true);

    loadTestConfig({ logging: { enabled: true, level: 'error', pretty: false } });
    expect(logger.isLevelEnabled('warn')).toBe(false);
    expect(logger.isLevelEnabled('error')).toBe(true);
  });

  it('should write nothing when disabled', () => {
    loadTestConfig({ logging: { enabled: false, level: 'trace' } });
    getLogger().fatal('ignored');
    expect(captured).toHaveLength(0);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// CHILD LOGGERS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Child loggers', () => {
  it('should merge context and inherit the component', () => {
    const parent = getLogger({ component: 'platform', context: { host: 'test-host' } });
    parent.child({ context: { interface: 'eth0' } }).info('Snapshot');

    expect(entries()[0]).toMatchObject({
      component: 'platform',
      host: 'test-host',
      interface: 'eth0',
    });
  });

  it('should expose component loggers', () => {
    loggers.codec.debug('codec line');
    loggers.address.debug('address line');
    expect(entries()).toMatchObject([
      { component: 'codec', msg: 'codec line' },
      { component: 'address', msg: 'address line' },
    ]);
  });

  it('should log rejected descriptors at debug level', () => {
    AddressDescriptor.tryParse('not-an-address/24');
    expect(entries()).toEqual([
      expect.objectContaining({
        level: 'debug',
        component: 'address',
        msg: 'Rejected address descriptor',
        reason: 'NullAddress',
        address: 'not-an-address',
        prefixLength: 24,
      }),
    ]);
  });
});

// ─────────────────────────────────────────────────────────────────────────────────
// PRETTY OUTPUT AND SINKS
// ─────────────────────────────────────────────────────────────────────────────────

describe('Logger pretty output', () => {
  it('should write a colored single line', () => {
    loadTestConfig({ logging: { enabled: true, level: 'info', pretty: true } });
    getLogger({ component: 'codec' }).info('hello');
    getLogger({ component: 'codec' }).info('with context', { n: 1 });

    expect(captured[0]?.line.endsWith('\x1b[32mINFO \x1b[0m [codec] hello')).toBe(true);
    expect(captured[1]?.line.endsWith('[codec] with context \x1b[2m{"n":1}\x1b[0m')).toBe(true);
  });

  it('should route to the console after reset', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    resetLogger();

    getLogger().warn('to console');

    expect(warn).toHaveBeenCalledTimes(1);
    expect(captured).toHaveLength(0);
  });
});

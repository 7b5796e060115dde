/**
 * Logger Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  createLogger,
  formatLogEntry,
  parseLogLevel,
  setLogHandler,
  setLogLevel,
  type LogEntry,
} from './logger.js';

describe('logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
    setLogHandler((entry) => entries.push(entry));
    setLogLevel('info');
  });

  afterEach(() => {
    setLogHandler(null);
    setLogLevel('info');
  });

  it('suppresses entries below the current level', () => {
    const log = createLogger('Test');
    log.debug('hidden');
    log.info('shown');

    expect(entries.map(e => e.message)).toEqual(['shown']);
  });

  it('merges child context into every entry', () => {
    const log = createLogger('Dispatcher', { runId: 'run-1' }).child({ worker: 'echo' });
    log.warn('slow target', { region: 'us-east-1' });

    expect(entries[0].tag).toBe('Dispatcher');
    expect(entries[0].context).toEqual({ runId: 'run-1', worker: 'echo', region: 'us-east-1' });
  });

  it('omits empty context', () => {
    createLogger('Test').error('boom');
    expect(entries[0].context).toBeUndefined();
  });
});

describe('formatLogEntry', () => {
  it('prefixes the tag and appends context as JSON', () => {
    expect(formatLogEntry({
      level: 'info',
      tag: 'Engine',
      message: 'Run started',
      context: { targets: 2 },
      timestamp: '2024-01-01T00:00:00.000Z',
    })).toBe('[Engine] Run started {"targets":2}');
  });
});

describe('parseLogLevel', () => {
  it('normalizes case and rejects unknown levels', () => {
    expect(parseLogLevel(' DEBUG ')).toBe('debug');
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});

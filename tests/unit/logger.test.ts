/**
 * Unit Tests: Logger Redaction
 */

import { describe, it, expect } from 'vitest';
import {
  createLogger,
  redactPatterns,
  redactRecord,
  redactString,
  type LogLevel,
} from '../../src/api/logger.js';

function capture(json = false) {
  const lines: Array<{ level: LogLevel; line: string }> = [];
  const logger = createLogger({ level: 'debug', timestamps: false, json }, (level, line) => {
    lines.push({ level, line });
  });
  return { logger, lines };
}

describe('redactString', () => {
  it('masks short values completely', () => {
    expect(redactString('short')).toBe('[REDACTED]');
  });

  it('keeps the ends of long values', () => {
    expect(redactString('abcd1234efgh5678')).toBe('abcd...5678');
  });
});

describe('redactPatterns', () => {
  it('masks bearer tokens in text', () => {
    expect(redactPatterns('Authorization: Bearer placeholdervalue')).toBe('Authorization: Bear...alue');
  });
});

describe('redactRecord', () => {
  it('masks sensitive keys regardless of case', () => {
    expect(redactRecord({ Password: 'test-secret-value', username: 'manager' })).toEqual({
      Password: 'test...alue',
      username: 'manager',
    });
  });

  it('keeps unset sensitive values', () => {
    expect(redactRecord({ password: null })).toEqual({ password: null });
  });

  it('masks nested records', () => {
    expect(redactRecord({ headers: { authorization: 'x' } })).toEqual({
      headers: { authorization: '[REDACTED]' },
    });
  });
});

describe('ApiLogger', () => {
  it('formats human-readable lines with context', () => {
    const { logger, lines } = capture();
    logger.info('organization created', { handle: 'proj-1,org-9' });
    expect(lines).toEqual([
      { level: 'info', line: '[INFO] organization created {"handle":"proj-1,org-9"}' },
    ]);
  });

  it('adds child fields to every entry', () => {
    const { logger, lines } = capture();
    logger.child({ kind: 'organization' }).warn('slow', { durationMs: 12 });
    expect(lines[0].line).toBe('[WARN] slow {"kind":"organization","durationMs":12}');
  });

  it('filters below the configured level', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', timestamps: false }, (_level, line) => {
      lines.push(line);
    });
    logger.debug('hidden');
    logger.info('hidden');
    logger.error('shown');
    expect(lines).toEqual(['[ERROR] shown']);
  });

  it('never logs a password from context', () => {
    const { logger, lines } = capture(true);
    logger.debug('manager state', { password: 'test-secret' });
    const entry: unknown = JSON.parse(lines[0].line);
    expect(entry).toMatchObject({ level: 'debug', context: { password: 'test...cret' } });
  });
});

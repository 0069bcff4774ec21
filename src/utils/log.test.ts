import { describe, it, expect, vi, afterEach, beforeEach, type MockInstance } from 'vitest';
import { logDebug, logInfo, logWarn, logError, errorMessage, getLogLevel, formatMessage } from './log.js';

describe('errorMessage', () => {
  it('extracts message from Error instance', () => {
    expect(errorMessage(new Error('disk full'))).toBe('disk full');
  });

  it('converts non-Error to string', () => {
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage(null)).toBe('null');
  });
});

describe('getLogLevel', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to info for unknown values', () => {
    vi.stubEnv('DOCNAV_LOG_LEVEL', 'loud');
    expect(getLogLevel()).toBe('info');
  });

  it('is case-insensitive', () => {
    vi.stubEnv('DOCNAV_LOG_LEVEL', 'WARN');
    expect(getLogLevel()).toBe('warn');
  });
});

describe('formatMessage', () => {
  it('omits empty extra objects', () => {
    const line = formatMessage('info', 'indexer', 'done', {});
    expect(line.endsWith('[INFO] [indexer] done')).toBe(true);
  });
});

describe('log functions', () => {
  let writeSpy: MockInstance<typeof process.stderr.write>;

  beforeEach(() => {
    writeSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    writeSpy.mockRestore();
  });

  it('logDebug writes to stderr at debug level', () => {
    vi.stubEnv('DOCNAV_LOG_LEVEL', 'debug');
    logDebug('store', 'loaded');
    expect(writeSpy).toHaveBeenCalledOnce();
    const output = String(writeSpy.mock.calls[0][0]);
    expect(output).toContain('[DEBUG] [store] loaded');
  });

  it('logInfo is suppressed at warn level', () => {
    vi.stubEnv('DOCNAV_LOG_LEVEL', 'warn');
    logInfo('indexer', 'scanning');
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('silent level suppresses everything', () => {
    vi.stubEnv('DOCNAV_LOG_LEVEL', 'silent');
    logDebug('a', 'b');
    logInfo('a', 'b');
    logWarn('a', 'b');
    logError('a', 'b');
    expect(writeSpy).not.toHaveBeenCalled();
  });

  it('includes extra data as JSON', () => {
    vi.stubEnv('DOCNAV_LOG_LEVEL', 'warn');
    logWarn('indexer', 'skipped file', { path: 'docs/a.md', reason: 'EACCES' });
    const output = String(writeSpy.mock.calls[0][0]);
    expect(output).toContain('{"path":"docs/a.md","reason":"EACCES"}');
  });
});

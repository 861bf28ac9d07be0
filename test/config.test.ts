import { describe, expect, it } from 'vitest';
import { loadLogSettings, resolveServerOptions } from '../src/config.js';

describe('resolveServerOptions', () => {
  it('defaults to an ephemeral port on the loopback address', () => {
    expect(resolveServerOptions()).toEqual({ host: '127.0.0.1', port: 0 });
  });

  it('keeps explicit values', () => {
    expect(resolveServerOptions({ host: 'localhost', port: 8080 })).toEqual({
      host: 'localhost',
      port: 8080,
    });
  });

  it('rejects out-of-range ports', () => {
    expect(() => resolveServerOptions({ port: -1 })).toThrow();
  });
});

describe('loadLogSettings', () => {
  it('defaults to warn on the console', () => {
    expect(loadLogSettings({})).toEqual({ level: 'warn', silent: false, file: undefined });
  });

  it('reads level, silence and file from the environment', () => {
    expect(
      loadLogSettings({
        HTTP_MOCK_LOG_LEVEL: ' DEBUG ',
        HTTP_MOCK_SILENT: 'true',
        HTTP_MOCK_LOG_FILE: '/tmp/http-mock.log',
      })
    ).toEqual({ level: 'debug', silent: true, file: '/tmp/http-mock.log' });
  });

  it('accepts 1 as a silent flag', () => {
    expect(loadLogSettings({ HTTP_MOCK_SILENT: '1' }).silent).toBe(true);
    expect(loadLogSettings({ HTTP_MOCK_SILENT: 'no' }).silent).toBe(false);
  });

  it('falls back to warn for an unknown level', () => {
    expect(loadLogSettings({ HTTP_MOCK_LOG_LEVEL: 'loud', HTTP_MOCK_SILENT: '1' })).toEqual({
      level: 'warn',
      silent: true,
      file: undefined,
    });
  });

  it('ignores a blank log file', () => {
    expect(loadLogSettings({ HTTP_MOCK_LOG_FILE: '   ' }).file).toBeUndefined();
  });
});

import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_API_URL, DEFAULT_PORT, DEFAULT_TIMEOUT_MS, loadConfig, parsePort } from '../src/config.js';

describe('loadConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      apiUrl: DEFAULT_API_URL,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      port: DEFAULT_PORT,
    });
    expect(DEFAULT_API_URL).toBe('http://localhost:8080/api');
    expect(DEFAULT_TIMEOUT_MS).toBe(30000);
  });

  it('reads overrides', () => {
    expect(
      loadConfig({
        MANAGED_DB_API_URL: 'https://db.example.test/api',
        MANAGED_DB_API_TIMEOUT_MS: '5000',
        PORT: '4000',
      })
    ).toEqual({ apiUrl: 'https://db.example.test/api', timeoutMs: 5000, port: 4000 });
  });

  it('falls back and warns on invalid numbers', () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const config = loadConfig({ MANAGED_DB_API_TIMEOUT_MS: 'soon', PORT: '0' });

    expect(config.timeoutMs).toBe(DEFAULT_TIMEOUT_MS);
    expect(config.port).toBe(DEFAULT_PORT);
    expect(warn).toHaveBeenCalledWith('[config] Ignoring invalid MANAGED_DB_API_TIMEOUT_MS=soon, using 30000');
    expect(warn).toHaveBeenCalledWith('[config] Ignoring invalid PORT=0, using 3102');
  });

  it('rejects a PORT above 65535', () => {
    const warn = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(loadConfig({ PORT: '70000' }).port).toBe(DEFAULT_PORT);
    expect(warn).toHaveBeenCalledWith('[config] Ignoring invalid PORT=70000, using 3102');
  });

  it('keeps an empty API URL so tool calls can report it', () => {
    expect(loadConfig({ MANAGED_DB_API_URL: '' }).apiUrl).toBe('');
  });
});

describe('parsePort', () => {
  it('accepts a port number', () => {
    expect(parsePort('8080')).toBe(8080);
  });

  it.each(['', 'abc', '0', '-1', '80.5', '65536'])('rejects %j', value => {
    expect(parsePort(value)).toBeUndefined();
  });
});

import { describe, expect, test } from 'vitest';
import { ConfigError, loadConfig } from '../src/lib/config.js';

describe('loadConfig', () => {
  test('defaults', () => {
    expect(loadConfig({})).toEqual({
      isProduction: false,
      port: 3000,
      host: '0.0.0.0',
      logLevel: 'info',
      databasePath: './data/tokenboard.db',
      busyTimeoutMs: 5000,
      timeZone: 'UTC',
      redisUrl: undefined,
      corsOrigin: undefined,
      userIdHeader: 'x-user-id',
    });
  });

  test('reads and normalizes overrides', () => {
    const config = loadConfig({
      NODE_ENV: 'production',
      PORT: '8080',
      LEDGER_TIME_ZONE: 'Asia/Seoul',
      REDIS_URL: '',
      USER_ID_HEADER: 'X-Forwarded-User',
      DB_BUSY_TIMEOUT_MS: '250',
    });

    expect(config.isProduction).toBe(true);
    expect(config.port).toBe(8080);
    expect(config.timeZone).toBe('Asia/Seoul');
    expect(config.redisUrl).toBeUndefined();
    expect(config.userIdHeader).toBe('x-forwarded-user');
    expect(config.busyTimeoutMs).toBe(250);
  });

  test('rejects an unknown time zone', () => {
    let caught: unknown;
    try {
      loadConfig({ LEDGER_TIME_ZONE: 'Mars/Olympus_Mons' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues.LEDGER_TIME_ZONE).toEqual([
      'Unknown IANA time zone: Mars/Olympus_Mons',
    ]);
  });

  test('rejects a non-numeric port', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ConfigError);
  });
});

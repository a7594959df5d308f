import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig } from '../src/config.js';
import { DEFAULT_LABELS, URLS } from '../src/xserver/selectors.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.credentials).toBeNull();
    expect(config.cookie).toBeNull();
    expect(config.targetGame).toBeNull();
    expect(config.cookieDomains).toEqual(['secure.xserver.ne.jp', 'www.xserver.ne.jp']);
    expect(config.renewHours).toBe(72);
    expect(config.minIntervalHours).toBe(24);
    expect(config.forceRenew).toBe(false);
    expect(config.outcomeLogPath).toBe('renew_result.md');
    expect(config.logTimezone).toBe('Asia/Tokyo');
    expect(config.headless).toBe(true);
    expect(config.defaultTimeoutMs).toBe(15000);
    expect(config.shortTimeoutMs).toBe(4000);
    expect(config.strictSuccessDetection).toBe(false);
    expect(config.loginUrl).toBe(URLS.LOGIN);
    expect(config.indexUrl).toBe(URLS.GAME_INDEX);
    expect(config.labels).toEqual(DEFAULT_LABELS);
  });

  it('reads login material and run settings', () => {
    const config = loadConfig({
      XSERVER_EMAIL: ' user@example.com ',
      XSERVER_PASSWORD: 'test-password',
      XSERVER_COOKIE: 'sid=abc',
      TARGET_GAME: 'waters',
      RENEW_HOURS: '48',
      MIN_INTERVAL_HOURS: '12.5',
      FORCE_RENEW: 'yes',
      HEADLESS: '0',
      STRICT_SUCCESS_DETECTION: 'true',
      XSERVER_COOKIE_DOMAINS: 'Secure.Example.test, www.example.test',
    });

    expect(config.credentials).toEqual({ email: 'user@example.com', password: 'test-password' });
    expect(config.cookie).toBe('sid=abc');
    expect(config.targetGame).toBe('waters');
    expect(config.renewHours).toBe(48);
    expect(config.minIntervalHours).toBe(12.5);
    expect(config.forceRenew).toBe(true);
    expect(config.headless).toBe(false);
    expect(config.strictSuccessDetection).toBe(true);
    expect(config.cookieDomains).toEqual(['secure.example.test', 'www.example.test']);
  });

  it('needs both email and password for credentials', () => {
    expect(loadConfig({ XSERVER_EMAIL: 'user@example.com' }).credentials).toBeNull();
    expect(loadConfig({ XSERVER_PASSWORD: 'test-password' }).credentials).toBeNull();
  });

  it('treats blank values as unset', () => {
    const config = loadConfig({ XSERVER_COOKIE: '   ', TARGET_GAME: '' });
    expect(config.cookie).toBeNull();
    expect(config.targetGame).toBeNull();
  });

  it('rejects a non-numeric or non-positive duration', () => {
    expect(() => loadConfig({ RENEW_HOURS: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig({ RENEW_HOURS: '0' })).toThrow(ConfigError);
  });

  it('rejects a malformed URL', () => {
    expect(() => loadConfig({ XSERVER_INDEX_URL: 'not a url' })).toThrow(/indexUrl/);
  });

  it('returns a frozen object', () => {
    const config = loadConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.labels)).toBe(true);
  });
});

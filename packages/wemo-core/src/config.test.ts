import { describe, it, expect } from 'vitest';
import { defaultConfig, initializeConfig, loadConfig } from './config';
import { getProcessedEnv, isStringLosslesslyNumeric } from './envLoader';

describe('isStringLosslesslyNumeric', () => {
  it('מזהה מחרוזות מספריות בלבד', () => {
    expect(isStringLosslesslyNumeric('5000')).toBe(true);
    expect(isStringLosslesslyNumeric('0.5')).toBe(true);
    expect(isStringLosslesslyNumeric('1.0')).toBe(true);
    expect(isStringLosslesslyNumeric('0x10')).toBe(false);
    expect(isStringLosslesslyNumeric('192.168.1.10')).toBe(false);
    expect(isStringLosslesslyNumeric('  ')).toBe(false);
    expect(isStringLosslesslyNumeric(42)).toBe(false);
  });
});

describe('getProcessedEnv', () => {
  it('ממיר ערכים מספריים ומשאיר את השאר', () => {
    expect(getProcessedEnv({ A: '10', B: 'text', C: undefined })).toEqual({ A: 10, B: 'text', C: undefined });
  });
});

describe('loadConfig', () => {
  it('מחזיר את ברירות המחדל כשאין משתני סביבה', () => {
    expect(loadConfig({})).toEqual(defaultConfig);
  });

  it('דורס עלים לפי שם המשתנה ב-SNAKE_CASE', () => {
    const loaded = loadConfig({
      DISCOVERY_TIMEOUT_MS: '2500',
      LISTENER_BIND_PORT: '3500',
      LISTENER_ADVERTISE_ADDRESS: '192.168.1.10',
      RENEWAL_RENEW_FRACTION: '0.5',
    });

    expect(loaded.discovery.timeoutMs).toBe(2500);
    expect(loaded.listener.bindPort).toBe(3500);
    expect(loaded.listener.advertiseAddress).toBe('192.168.1.10');
    expect(loaded.renewal.renewFraction).toBe(0.5);
    expect(loaded.control).toEqual(defaultConfig.control);
  });

  it('מתעלם מערך שהטיפוס שלו לא מתאים', () => {
    const loaded = loadConfig({ CONTROL_RETRIES: 'many', LISTENER_PATH_PREFIX: '/hooks' });

    expect(loaded.control.retries).toBe(3);
    expect(loaded.listener.pathPrefix).toBe('/hooks');
  });
});

describe('initializeConfig', () => {
  it('ממיר true/false לעלים בוליאניים', () => {
    const defaults = { feature: { enabled: false, name: 'x' } };
    expect(initializeConfig(defaults, { FEATURE_ENABLED: 'true', FEATURE_NAME: 7 })).toEqual({ feature: { enabled: true, name: '7' } });
  });
});

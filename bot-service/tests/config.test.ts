import { describe, it, expect } from 'vitest';
import { ConfigError, getConfig } from '../src/config.js';

describe('getConfig', () => {
  it('applies defaults when only the token is set', () => {
    expect(getConfig({ TELEGRAM_BOT_TOKEN: 'test-token' })).toEqual({
      telegram: { botToken: 'test-token', webAppUrl: 'https://example.com/webapp/' },
      adminIds: [],
      logLevel: 'info',
      nodeEnv: 'production',
      navigation: { maxStackDepth: 32 },
      bouquet: { basePrice: 2000 },
    });
  });

  it('parses every variable', () => {
    const config = getConfig({
      TELEGRAM_BOT_TOKEN: 'test-token',
      WEBAPP_URL: 'https://shop.example.test/app/',
      ADMIN_IDS: ' 101, 202 ,',
      LOG_LEVEL: 'debug',
      NODE_ENV: 'development',
      NAV_STACK_MAX_DEPTH: '8',
      BOUQUET_BASE_PRICE: '1500',
    });

    expect(config.telegram.webAppUrl).toBe('https://shop.example.test/app/');
    expect(config.adminIds).toEqual([101, 202]);
    expect(config.logLevel).toBe('debug');
    expect(config.nodeEnv).toBe('development');
    expect(config.navigation.maxStackDepth).toBe(8);
    expect(config.bouquet.basePrice).toBe(1500);
  });

  it('lists every invalid variable', () => {
    let caught: unknown;
    try {
      getConfig({ TELEGRAM_BOT_TOKEN: '', ADMIN_IDS: '101,abc', NAV_STACK_MAX_DEPTH: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.name).toBe('ConfigError');
      expect(caught.details.map((detail) => detail.variable)).toEqual([
        'TELEGRAM_BOT_TOKEN',
        'ADMIN_IDS',
        'NAV_STACK_MAX_DEPTH',
      ]);
      expect(caught.details[0]).toEqual({
        variable: 'TELEGRAM_BOT_TOKEN',
        message: 'TELEGRAM_BOT_TOKEN is required',
      });
      expect(caught.details[1]).toEqual({ variable: 'ADMIN_IDS', message: "Invalid admin id 'abc'" });
      expect(caught.message.startsWith('Invalid configuration: TELEGRAM_BOT_TOKEN: TELEGRAM_BOT_TOKEN is required; ')).toBe(true);
    }
  });

  it('rejects a stack depth below two', () => {
    expect(() => getConfig({ TELEGRAM_BOT_TOKEN: 'test-token', NAV_STACK_MAX_DEPTH: '1' })).toThrow(
      ConfigError
    );
    expect(getConfig({ TELEGRAM_BOT_TOKEN: 'test-token', NAV_STACK_MAX_DEPTH: '2' }).navigation.maxStackDepth).toBe(2);
  });

  it('rejects a missing token', () => {
    expect(() => getConfig({})).toThrow(ConfigError);
  });
});

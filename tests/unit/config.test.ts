import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../src/config.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      env: 'development',
      feed: { url: 'wss://ws.finnhub.io', tokenParam: 'token', apiKey: undefined },
      symbols: [],
      storageKey: 'state',
      storageDir: '.ticker-client',
      logLevel: 'info',
      logPretty: true,
      metricsPort: 0,
    });
  });

  it('parses symbols, key and port', () => {
    const cfg = loadConfig({
      FEED_URL: 'wss://feed.test',
      FEED_API_KEY: 'test-key',
      SYMBOLS: ' AAPL, MSFT ,,BINANCE:BTCUSDT',
      METRICS_PORT: '9464',
      LOG_PRETTY: '0',
    });
    expect(cfg.feed).toEqual({ url: 'wss://feed.test', tokenParam: 'token', apiKey: 'test-key' });
    expect(cfg.symbols).toEqual(['AAPL', 'MSFT', 'BINANCE:BTCUSDT']);
    expect(cfg.metricsPort).toBe(9464);
    expect(cfg.logPretty).toBe(false);
  });

  it('treats an empty API key as absent', () => {
    expect(loadConfig({ FEED_API_KEY: '' }).feed.apiKey).toBeUndefined();
  });

  it('turns an empty storage directory into in-memory only', () => {
    expect(loadConfig({ STORAGE_DIR: '' }).storageDir).toBeUndefined();
  });

  it('throws ConfigError naming the bad variables', () => {
    try {
      loadConfig({ LOG_LEVEL: 'loud', METRICS_PORT: '-1' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(Object.keys(err.issues).sort()).toEqual(['LOG_LEVEL', 'METRICS_PORT']);
      }
    }
  });
});

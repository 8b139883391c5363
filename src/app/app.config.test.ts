import { loadConfig } from './app.config';

const RELAY_ENV = {
  RELAY_ENABLED: 'true',
  RELAY_BASE_URL: 'https://relay.test',
  RELAY_API_KEY: 'test-secret',
  RELAY_RESTAURANT_ID: 'restaurant-1',
};

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.databasePath).toBe('data/kitchen-dispatch.db');
    expect(config.corsOrigins).toBe(true);
    expect(config.dispatch).toEqual({ timeoutMs: 15_000, interTargetDelayMs: 500, probeTimeoutMs: 3_000 });
    expect(config.retry).toEqual({
      drainIntervalMs: 120_000,
      maxAttempts: 10,
      baseDelayMs: 30_000,
      maxDelayMs: 120_000,
    });
    expect(config.relay).toBeNull();
    expect(config.agent).toBeNull();
  });

  it('clamps intervals into range', () => {
    const config = loadConfig({ RETRY_DRAIN_INTERVAL_MS: '1000', DISPATCH_TIMEOUT_MS: '999999' });

    expect(config.retry.drainIntervalMs).toBe(5_000);
    expect(config.dispatch.timeoutMs).toBe(120_000);
  });

  it('keeps the retry delay within the drain interval', () => {
    const config = loadConfig({ RETRY_DRAIN_INTERVAL_MS: '60000', RETRY_MAX_DELAY_MS: '900000' });

    expect(config.retry.maxDelayMs).toBe(60_000);
  });

  it('splits CORS origins', () => {
    expect(loadConfig({ CORS_ORIGINS: 'http://pos.local, http://kds.local,' }).corsOrigins).toEqual([
      'http://pos.local',
      'http://kds.local',
    ]);
  });

  it('rejects values that do not parse', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(/^Invalid environment configuration: PORT: /);
  });

  it('builds the relay block when enabled', () => {
    const config = loadConfig(RELAY_ENV);

    expect(config.relay).toMatchObject({
      baseUrl: 'https://relay.test',
      apiKey: 'test-secret',
      restaurantId: 'restaurant-1',
      restaurantName: 'Kitchen Dispatch',
      heartbeatIntervalMs: 60_000,
      maxReconnectAttempts: 5,
    });
  });

  it('names the relay variables that are missing', () => {
    expect(() => loadConfig({ RELAY_ENABLED: 'yes', RELAY_BASE_URL: 'https://relay.test' })).toThrow(
      'RELAY_ENABLED is set but these variables are missing: RELAY_API_KEY, RELAY_RESTAURANT_ID',
    );
  });

  it('reads a disabled flag as off', () => {
    expect(loadConfig({ ...RELAY_ENV, RELAY_ENABLED: 'off' }).relay).toBeNull();
  });

  it('configures the agent when its printer is named', () => {
    expect(
      loadConfig({ RELAY_AGENT_PRINTER_ID: 'printer-bar', RELAY_AGENT_PRINTER_HOST: '10.0.0.22' }).agent,
    ).toEqual({ printerId: 'printer-bar', printerHost: '10.0.0.22', printerPort: 9100, pollIntervalMs: 5_000 });
  });
});

import { ConfigError, loadConfig, processingBudgetMs } from '../../src/config/app.config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8000);
    expect(config.apiPrefix).toBe('/api/intelligence');
    expect(config.queue).toEqual({
      driver: 'bullmq',
      name: 'intelligence',
      prefix: 'bull',
      dequeueTimeoutMs: 5000,
      visibilityTimeoutMs: 120_000,
    });
    expect(config.jobs.retentionSeconds).toBe(604_800);
    expect(config.broker.url).toBe('http://orion-ld-service:1026');
    expect(config.workers.runInApi).toBe(true);
  });

  it('parses overrides from strings', () => {
    const config = loadConfig({
      PORT: '9100',
      QUEUE_DRIVER: 'memory',
      RUN_WORKERS_IN_API: 'false',
      ORION_URL: 'http://broker.test:1026/',
    });

    expect(config.port).toBe(9100);
    expect(config.queue.driver).toBe('memory');
    expect(config.workers.runInApi).toBe(false);
    expect(config.broker.url).toBe('http://broker.test:1026');
  });

  it('computes the worst-case processing budget', () => {
    // 30s plugin + 4 attempts × (10s timeout + 5s back-off)
    expect(processingBudgetMs(loadConfig({}))).toBe(90_000);
  });

  it('refuses a visibility timeout inside the processing budget', () => {
    expect(() => loadConfig({ VISIBILITY_TIMEOUT_MS: '90000' })).toThrow(ConfigError);
    expect(() => loadConfig({ VISIBILITY_TIMEOUT_MS: '90000' })).toThrow(
      'VISIBILITY_TIMEOUT_MS (90000) must exceed the processing budget of 90000ms',
    );
  });

  it('lists invalid variables', () => {
    expect(() => loadConfig({ PORT: 'abc', QUEUE_DRIVER: 'kafka' })).toThrow(/PORT: .*; QUEUE_DRIVER: /);
  });
});

import { loadConfig } from '../index';

describe('config module', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.MONITORING_URL;
    delete process.env.MONITORING_USER;
    delete process.env.MONITORING_PASSWORD;
    delete process.env.RPC_TIMEOUT_MS;
    delete process.env.RPC_LEGACY_AUTH;
    delete process.env.LOG_FILE;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('falls back to defaults', () => {
    const config = loadConfig();

    expect(config.monitoring).toEqual({ url: '', user: 'Admin', password: '' });
    expect(config.rpc).toEqual({ timeoutMs: 10_000, legacyAuth: false });
    expect(config.logging.file).toBe('');
  });

  it('reads monitoring and rpc settings from the environment', () => {
    process.env.MONITORING_URL = 'https://monitor.test';
    process.env.MONITORING_USER = 'automation';
    process.env.MONITORING_PASSWORD = 'test-password';
    process.env.RPC_TIMEOUT_MS = '2500';
    process.env.RPC_LEGACY_AUTH = 'yes';

    const config = loadConfig();

    expect(config.monitoring).toEqual({
      url: 'https://monitor.test',
      user: 'automation',
      password: 'test-password',
    });
    expect(config.rpc).toEqual({ timeoutMs: 2500, legacyAuth: true });
  });

  it('rejects a non-numeric timeout', () => {
    process.env.RPC_TIMEOUT_MS = 'soon';

    expect(() => loadConfig()).toThrow('Invalid numeric environment variable: RPC_TIMEOUT_MS');
  });

  it('reads logging settings', () => {
    process.env.LOG_LEVEL = 'warn';
    process.env.LOG_FILE = '/tmp/reconcile.log';

    expect(loadConfig().logging).toEqual({ level: 'warn', file: '/tmp/reconcile.log' });
  });
});

import configuration from '../configuration';

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('REDIS_')) {
        delete process.env[key];
      }
    }
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should fall back to defaults', () => {
    expect(configuration().redis).toEqual({
      mode: 'node',
      nodes: [{ host: '127.0.0.1', port: 6379 }],
      poolSize: 4,
      password: undefined,
      username: undefined,
      db: undefined,
      clientName: undefined,
      reconnectInitialDelayMs: 100,
      reconnectMaxDelayMs: 10000,
      commandRetries: 3,
      cluster: {
        refreshIntervalMs: 15000,
        minRefreshIntervalMs: 1000,
        nodesToQuery: 3,
        clientCloseDelayMs: 1000,
        maxRedirections: 3,
      },
      debugTraffic: false,
    });
  });

  it('should read the environment', () => {
    process.env.REDIS_MODE = 'cluster';
    process.env.REDIS_NODES = '10.0.0.1:7000, 10.0.0.2:7001@17001';
    process.env.REDIS_PASSWORD = 'test-secret';
    process.env.REDIS_DB = '2';
    process.env.REDIS_CLUSTER_MAX_REDIRECTIONS = '5';
    process.env.REDIS_DEBUG_TRAFFIC = 'true';

    const { redis } = configuration();

    expect(redis.mode).toBe('cluster');
    expect(redis.nodes).toEqual([
      { host: '10.0.0.1', port: 7000 },
      { host: '10.0.0.2', port: 7001 },
    ]);
    expect(redis.password).toBe('test-secret');
    expect(redis.db).toBe(2);
    expect(redis.cluster.maxRedirections).toBe(5);
    expect(redis.debugTraffic).toBe(true);
  });

  it('should reject an unknown mode', () => {
    process.env.REDIS_MODE = 'sentinel';

    expect(() => configuration()).toThrow('Invalid REDIS_MODE: sentinel');
  });
});

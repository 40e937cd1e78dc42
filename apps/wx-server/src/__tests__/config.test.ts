import path from 'path';
import { describe, it, expect } from '@jest/globals';
import { loadConfig } from '../config';

describe('loadConfig', () => {
  it('should use the documented defaults', () => {
    expect(loadConfig({})).toEqual({
      port: 9990,
      host: '0.0.0.0',
      enableCors: true,
      maxLocations: 16,
      staticDir: path.join(__dirname, '..', '..', 'public'),
      legacyContentType: false,
      requestTimeoutMs: 15000,
      keepAliveTimeoutMs: 15000,
      shutdownGraceMs: 5000,
      redis: { url: 'redis://localhost:6379', poolMin: 0, poolMax: 50 }
    });
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({ PORT: '8080', ENABLE_CORS: 'false', MAX_LOCATIONS: '4', STATIC_DIR: '/srv/wx' });

    expect(config).toMatchObject({ port: 8080, enableCors: false, maxLocations: 4, staticDir: '/srv/wx' });
  });

  it('should read connection timeouts from the environment', () => {
    const config = loadConfig({ REQUEST_TIMEOUT_MS: '30000', KEEP_ALIVE_TIMEOUT_MS: '5000', SHUTDOWN_GRACE_MS: '250' });

    expect(config).toMatchObject({ requestTimeoutMs: 30000, keepAliveTimeoutMs: 5000, shutdownGraceMs: 250 });
  });
});

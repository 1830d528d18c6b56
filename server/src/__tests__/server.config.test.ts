import os from 'os';
import { loadServerConfig } from '../config/server.config';

describe('loadServerConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    expect(loadServerConfig({})).toEqual({
      port: 3001,
      nodeEnv: 'development',
      workerCount: Math.max(1, os.cpus().length),
      parallelThreshold: 2000,
      progressInterval: 500,
      uploadLimitBytes: 25 * 1024 * 1024,
      corsOrigins: ['http://localhost:4200', 'http://localhost:8084']
    });
  });

  it('should read values from the environment', () => {
    const config = loadServerConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      WORKER_COUNT: '3',
      PARALLEL_THRESHOLD: '0',
      PROGRESS_INTERVAL: '50',
      UPLOAD_LIMIT_MB: '2',
      CORS_ORIGINS: 'https://a.example, https://b.example,'
    });

    expect(config).toEqual({
      port: 8080,
      nodeEnv: 'production',
      workerCount: 3,
      parallelThreshold: 0,
      progressInterval: 50,
      uploadLimitBytes: 2 * 1024 * 1024,
      corsOrigins: ['https://a.example', 'https://b.example']
    });
  });

  it('should treat blank values as unset', () => {
    expect(loadServerConfig({ PORT: '', WORKER_COUNT: '' }).port).toBe(3001);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadServerConfig({ WORKER_COUNT: '0' })).toThrow(/^Invalid server environment: WORKER_COUNT: /);
    expect(() => loadServerConfig({ PORT: 'abc' })).toThrow(/^Invalid server environment: PORT: /);
  });
});

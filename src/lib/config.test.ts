import { describe, it, expect } from '@jest/globals';
import { loadConfig } from './config';

const credentials = {
  CLOUDFLARE_R2_ACCOUNT_ID: 'test-account',
  CLOUDFLARE_R2_ACCESS_KEY: 'test-access',
  CLOUDFLARE_R2_SECRET_KEY: 'test-secret',
  CLOUDFLARE_R2_BUCKET: 'test-bucket',
};

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({
      inputDir: 'output/estimates',
      outputDir: 'output',
      concurrency: 4,
      redisUrl: 'redis://localhost:6379',
      r2: null,
    });
  });

  it('coerces the concurrency', () => {
    expect(loadConfig({ EXTRACTION_CONCURRENCY: '8' }).concurrency).toBe(8);
  });

  it('rejects an out-of-range concurrency', () => {
    expect(() => loadConfig({ EXTRACTION_CONCURRENCY: '0' })).toThrow(/^Invalid environment configuration: EXTRACTION_CONCURRENCY/);
  });

  it('keeps local runs local even with credentials', () => {
    expect(loadConfig({ ...credentials }).r2).toBeNull();
  });

  it('enables R2 on request', () => {
    expect(loadConfig({ ...credentials, CLOUD_STORAGE_ENABLED: 'TRUE' }).r2).toEqual({
      accountId: 'test-account',
      accessKeyId: 'test-access',
      secretAccessKey: 'test-secret',
      bucket: 'test-bucket',
    });
  });

  it('enables R2 on CI when credentials are present', () => {
    expect(loadConfig({ ...credentials, CI: 'true' }).r2?.bucket).toBe('test-bucket');
    expect(loadConfig({ CI: 'true' }).r2).toBeNull();
  });

  it('honours an explicit opt-out on CI', () => {
    expect(loadConfig({ ...credentials, CI: 'true', CLOUD_STORAGE_ENABLED: 'false' }).r2).toBeNull();
  });

  it('treats placeholder credentials as missing', () => {
    const env = { ...credentials, CLOUDFLARE_R2_SECRET_KEY: 'PLACEHOLDER', CLOUD_STORAGE_ENABLED: 'true' };
    expect(loadConfig(env).r2).toBeNull();
  });
});

import { describe, expect, it } from 'vitest';
import { DEFAULT_IMAGE_TYPES, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.port).toBe(8787);
    expect(config.host).toBe('0.0.0.0');
    expect(config.publicBaseUrl).toBe('http://localhost:8787');
    expect(config.allowedOrigins).toEqual([]);
    expect(config.falKey).toBe('');
    expect(config.falRunUrl).toBe('https://fal.run/fal-ai/nano-banana/edit');
    expect(config.falAuthType).toBe('key');
    expect(config.providerTimeoutMs).toBe(120_000);
    expect(config.maxUploadBytes).toBe(10 * 1024 * 1024);
    expect(config.allowedImageTypes).toEqual(DEFAULT_IMAGE_TYPES);
    expect(config.maxImageDim).toBe(1536);
    expect(config.jpegQuality).toBe(92);
    expect(config.ttlMs).toBe(60 * 60 * 1000);
    expect(config.sweepIntervalMs).toBe(60_000);
    expect(config.tmpDir).toBe('.tmp');
    expect(config.rateLimitPerMinute).toBe(20);
    expect(config.trustProxy).toBe(false);
  });

  it('reads overrides and trims the public base url', () => {
    const config = loadConfig({
      PORT: '9000',
      PUBLIC_BASE_URL: 'https://tryon.example.test/',
      ALLOWED_ORIGINS: 'https://shop.test, https://www.shop.test ,',
      FAL_KEY: 'test-secret',
      FAL_AUTH_TYPE: 'Bearer',
      MAX_UPLOAD_MB: '5',
      ALLOWED_IMAGE_TYPES: 'image/PNG,image/jpeg',
      DELETE_AFTER_MINUTES: '15',
      TRUST_PROXY: 'true',
    });

    expect(config.port).toBe(9000);
    expect(config.publicBaseUrl).toBe('https://tryon.example.test');
    expect(config.allowedOrigins).toEqual(['https://shop.test', 'https://www.shop.test']);
    expect(config.falKey).toBe('test-secret');
    expect(config.falAuthType).toBe('bearer');
    expect(config.maxUploadBytes).toBe(5 * 1024 * 1024);
    expect(config.allowedImageTypes).toEqual(['image/png', 'image/jpeg']);
    expect(config.ttlMs).toBe(15 * 60 * 1000);
    expect(config.trustProxy).toBe(true);
  });

  it('derives the public base url from the port', () => {
    expect(loadConfig({ PORT: '3100' }).publicBaseUrl).toBe('http://localhost:3100');
  });

  it('rejects invalid numbers', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('Invalid PORT: abc');
    expect(() => loadConfig({ PORT: '0' })).toThrow('Invalid PORT: 0 (must be >= 1)');
    expect(() => loadConfig({ JPEG_QUALITY: '101' })).toThrow('Invalid JPEG_QUALITY: 101 (must be <= 100)');
  });

  it('rejects an unknown auth type', () => {
    expect(() => loadConfig({ FAL_AUTH_TYPE: 'basic' })).toThrow('Invalid FAL_AUTH_TYPE: basic');
  });

  it('treats a whitespace-only key as unset', () => {
    expect(loadConfig({ FAL_KEY: '  \n ' }).falKey).toBe('');
    expect(loadConfig({ FAL_KEY: ' test-secret\n' }).falKey).toBe('test-secret');
  });
});

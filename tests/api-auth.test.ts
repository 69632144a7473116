import { afterEach, describe, expect, it } from 'vitest';
import { Config } from '../lib/config';
import { authenticateApiKey } from '../lib/middleware/api-auth';

describe('authenticateApiKey', () => {
  const configuredKey = Config.EXTERNAL_API_KEY;

  afterEach(() => {
    Config.EXTERNAL_API_KEY = configuredKey;
  });

  it('lets every request through when no key is configured', () => {
    Config.EXTERNAL_API_KEY = '';
    expect(authenticateApiKey({ headers: {} })).toBeNull();
  });

  it('requires the X-API-Key header', () => {
    Config.EXTERNAL_API_KEY = 'test-secret';
    expect(authenticateApiKey({ headers: {} })).toBe('Missing X-API-Key header');
  });

  it('rejects a wrong key', () => {
    Config.EXTERNAL_API_KEY = 'test-secret';
    expect(authenticateApiKey({ headers: { 'x-api-key': 'other-secret' } })).toBe('Invalid API key');
  });

  it('accepts the configured key, also as the first of repeated headers', () => {
    Config.EXTERNAL_API_KEY = 'test-secret';
    expect(authenticateApiKey({ headers: { 'x-api-key': 'test-secret' } })).toBeNull();
    expect(authenticateApiKey({ headers: { 'x-api-key': ['test-secret', 'other-secret'] } })).toBeNull();
  });
});

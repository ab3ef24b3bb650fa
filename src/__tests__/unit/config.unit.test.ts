/**
 * Unit Tests — Environment schema
 *
 * Parses plain objects through the exported schema; the `config` built from
 * the real process.env at import time is not touched.
 */
import { envSchema, MAX_WAIT_TIMEOUT_SEC } from '@core/config';

describe('envSchema', () => {
  it('should apply the wait-timeout defaults', () => {
    const parsed = envSchema.parse({});

    expect(parsed.COLLECTION_DEFAULT_WAIT_TIMEOUT_SEC).toBe(30);
    expect(parsed.COLLECTION_MAX_WAIT_TIMEOUT_SEC).toBe(600);
  });

  it('should accept the longest wait a timer can hold', () => {
    const parsed = envSchema.parse({ COLLECTION_MAX_WAIT_TIMEOUT_SEC: '2147483' });

    expect(parsed.COLLECTION_MAX_WAIT_TIMEOUT_SEC).toBe(MAX_WAIT_TIMEOUT_SEC);
  });

  it('should reject a wait cap beyond what a timer can hold', () => {
    const result = envSchema.safeParse({ COLLECTION_MAX_WAIT_TIMEOUT_SEC: '2147484' });

    expect(result.success).toBe(false);
  });

  it('should reject a default wait beyond what a timer can hold', () => {
    const result = envSchema.safeParse({ COLLECTION_DEFAULT_WAIT_TIMEOUT_SEC: '3000000' });

    expect(result.success).toBe(false);
  });

  it('should read DB_SSL "false" as false', () => {
    expect(envSchema.parse({ DB_SSL: 'false' }).DB_SSL).toBe(false);
  });
});

/**
 * Tests for the configuration schema.
 */
import { describe, it, expect } from 'vitest';
import { ConfigSchema, DEFAULT_EXCLUDE, DEFAULT_INCLUDE } from '../../../../src/core/config/schema.js';

describe('ConfigSchema', () => {
  it('should accept an empty document', () => {
    const config = ConfigSchema.parse({});

    expect(config.include).toEqual(DEFAULT_INCLUDE);
    expect(config.exclude).toEqual(DEFAULT_EXCLUDE);
  });

  it('should treat null sections as missing', () => {
    const config = ConfigSchema.parse({ annotations: null, cache: null });

    expect(config.annotations.mode).toBe('permissive');
    expect(config.cache.path).toBe('.acp.cache.json');
  });

  it('should reject custom namespaces with spaces', () => {
    expect(ConfigSchema.safeParse({ annotations: { custom_namespaces: ['team note'] } }).success).toBe(false);
  });

  it('should reject a concurrency of zero', () => {
    expect(ConfigSchema.safeParse({ indexing: { concurrency: 0 } }).success).toBe(false);
  });

  it('should reject a review threshold above one', () => {
    expect(ConfigSchema.safeParse({ annotations: { review_threshold: 1.5 } }).success).toBe(false);
  });
});

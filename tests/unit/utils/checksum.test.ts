/**
 * Tests for content checksums.
 */
import { describe, it, expect } from 'vitest';
import { computeChecksum } from '../../../src/utils/checksum.js';

describe('computeChecksum', () => {
  it('should compute a 16-character checksum', () => {
    const checksum = computeChecksum('test content');
    expect(checksum).toHaveLength(16);
  });

  it('should return consistent checksum for same content', () => {
    const content = 'hello world';
    const checksum1 = computeChecksum(content);
    const checksum2 = computeChecksum(content);
    expect(checksum1).toBe(checksum2);
  });

  it('should return different checksum for different content', () => {
    const checksum1 = computeChecksum('content A');
    const checksum2 = computeChecksum('content B');
    expect(checksum1).not.toBe(checksum2);
  });

  it('should be case sensitive', () => {
    const checksum1 = computeChecksum('Hello');
    const checksum2 = computeChecksum('hello');
    expect(checksum1).not.toBe(checksum2);
  });

  it('should handle empty string', () => {
    const checksum = computeChecksum('');
    expect(checksum).toHaveLength(16);
  });

  it('should match the sha-256 prefix of the content', () => {
    expect(computeChecksum('')).toBe('e3b0c44298fc1c14');
    expect(computeChecksum('abc')).toBe('ba7816bf8f01cfea');
  });

  it('should distinguish line ending styles', () => {
    expect(computeChecksum('a\nb\n')).not.toBe(computeChecksum('a\r\nb\r\n'));
  });
});

import { describe, it, expect } from 'vitest';
import { hashString } from './hash.js';

describe('hashString', () => {
  it('should generate consistent MD5 hash', () => {
    const content = 'Flood Mitigation Hearing';
    const hash1 = hashString(content);
    const hash2 = hashString(content);

    expect(hash1).toBe(hash2);
    expect(hash1).toMatch(/^[a-f0-9]{32}$/);
  });

  it('should match the known digest of an empty string', () => {
    expect(hashString('')).toBe('d41d8cd98f00b204e9800998ecf8427e');
  });

  it('should generate different hashes for different content', () => {
    expect(hashString('Hearing')).not.toBe(hashString('Markup'));
  });

  it('should be case sensitive', () => {
    expect(hashString('Hello')).not.toBe(hashString('hello'));
  });
});

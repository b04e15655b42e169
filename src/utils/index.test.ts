/**
 * Utility tests
 */

import { describe, it, expect } from 'vitest';
import { parseU64, U64_MAX } from './index.js';

describe('parseU64', () => {
  it('should parse decimal integers in range', () => {
    expect(parseU64('0')).toBe(0n);
    expect(parseU64('007')).toBe(7n);
    expect(parseU64('18446744073709551615')).toBe(U64_MAX);
  });

  it('should return null for anything else', () => {
    expect(parseU64('18446744073709551616')).toBeNull();
    expect(parseU64('-3')).toBeNull();
    expect(parseU64('1e3')).toBeNull();
    expect(parseU64('')).toBeNull();
  });
});

/**
 * Configuration parsing tests
 */

import { describe, it, expect } from 'vitest';
import { parseTimeoutMs } from '../../config/index.js';

describe('parseTimeoutMs', () => {
  it('should fall back to the default for missing or invalid values', () => {
    expect(parseTimeoutMs(undefined, 15000)).toBe(15000);
    expect(parseTimeoutMs('soon', 15000)).toBe(15000);
    expect(parseTimeoutMs('0', 15000)).toBe(15000);
  });

  it('should accept positive millisecond values', () => {
    expect(parseTimeoutMs('2500', 15000)).toBe(2500);
  });

  it('should cap values at the longest timer delay', () => {
    expect(parseTimeoutMs('3000000000', 15000)).toBe(2_147_483_647);
  });
});

import {describe, expect, test} from 'vitest';
import {
  HASH_BITS,
  bucketIndex,
  clampBits,
  formatBinary,
  leftmostOnePosition,
  rightmostOnePosition,
  toUint64,
} from './bits.ts';

const ALL_ONES = (1n << 64n) - 1n;

describe('bucketIndex', () => {
  test('is always 0 with no index bits', () => {
    expect(bucketIndex(ALL_ONES, 0)).toBe(0);
    expect(bucketIndex(1n << 63n, 0)).toBe(0);
  });

  test.each([1, 2, 5, 12, 30])(
    'most significant bit alone maps to index 1 (bits=%i)',
    bits => {
      expect(bucketIndex(1n << 63n, bits)).toBe(1);
    },
  );

  test.each([1, 2, 5, 12, 30])(
    'last index bit alone maps to 2^(bits-1) (bits=%i)',
    bits => {
      expect(bucketIndex(1n << BigInt(63 - (bits - 1)), bits)).toBe(
        2 ** (bits - 1),
      );
    },
  );

  test('reverses the top bits', () => {
    // top four bits 1100 -> index 0011
    expect(bucketIndex(0xcn << 60n, 4)).toBe(0b0011);
    // top four bits 1000 -> index 0001
    expect(bucketIndex(0x8n << 60n, 4)).toBe(0b0001);
    // top four bits 0010 -> index 0100
    expect(bucketIndex(0x2n << 60n, 4)).toBe(0b0100);
  });

  test('ignores bits below the index bits', () => {
    expect(bucketIndex((1n << 62n) - 1n, 2)).toBe(0);
    expect(bucketIndex(ALL_ONES, 3)).toBe(7);
  });
});

describe('leftmostOnePosition', () => {
  test('scans all 64 bits with no index bits', () => {
    expect(leftmostOnePosition(ALL_ONES, 0)).toBe(1);
    expect(leftmostOnePosition(1n, 0)).toBe(64);
    expect(leftmostOnePosition(1n << 40n, 0)).toBe(24);
  });

  test('is 0 when the remaining bits are all zero', () => {
    expect(leftmostOnePosition(0n, 0)).toBe(0);
    expect(leftmostOnePosition(0xfn << 60n, 4)).toBe(0);
  });

  test('counts from just below the index bits', () => {
    expect(leftmostOnePosition(1n << 59n, 4)).toBe(1);
    expect(leftmostOnePosition((0xfn << 60n) | (1n << 58n), 4)).toBe(2);
    expect(leftmostOnePosition(1n, 4)).toBe(60);
  });

  test('crosses the 32-bit boundary', () => {
    expect(leftmostOnePosition(1n << 32n, 0)).toBe(32);
    expect(leftmostOnePosition(1n << 31n, 0)).toBe(33);
  });
});

describe('rightmostOnePosition', () => {
  test('is zero-based from bit 0', () => {
    expect(rightmostOnePosition(1n, 2)).toBe(0);
    expect(rightmostOnePosition(0b1000n, 2)).toBe(3);
    expect(rightmostOnePosition(ALL_ONES, 2)).toBe(0);
    expect(rightmostOnePosition(1n << 40n, 0)).toBe(40);
  });

  test('is 64 - bits when the remaining bits are all zero', () => {
    expect(rightmostOnePosition(0n, 0)).toBe(HASH_BITS);
    expect(rightmostOnePosition(0n, 2)).toBe(62);
    // Only index bits set.
    expect(rightmostOnePosition(3n << 62n, 2)).toBe(62);
  });
});

describe('clampBits', () => {
  test('clamps negative exponents to 0', () => {
    expect(clampBits(-1)).toBe(0);
    expect(clampBits(-100)).toBe(0);
  });

  test('keeps valid exponents', () => {
    expect(clampBits(0)).toBe(0);
    expect(clampBits(14)).toBe(14);
    expect(clampBits(30)).toBe(30);
  });

  test('rejects non-integer and oversized exponents', () => {
    expect(() => clampBits(1.5)).toThrow('bits must be an integer: 1.5');
    expect(() => clampBits(31)).toThrow('bits must be at most 30: 31');
  });
});

test('toUint64 reads negative and oversized hashes as 64-bit unsigned', () => {
  expect(toUint64(-1n)).toBe(ALL_ONES);
  expect(toUint64((1n << 64n) + 5n)).toBe(5n);
});

test('formatBinary', () => {
  expect(formatBinary(5n)).toBe('0'.repeat(61) + '101');
  expect(formatBinary(-1n)).toBe('1'.repeat(64));
});

/**
 * @file shared/codec/codec.test.ts
 * @description Decimal-string amounts and JSON-safe copies
 */

import { describe, it, expect } from '@jest/globals';
import { AmountSchema, SignedAmountSchema, numberKeyedMap, toJson } from './index';

describe('AmountSchema', () => {
  it('parses decimal strings beyond 2^53', () => {
    expect(AmountSchema.parse('123456789012345678901234567890')).toBe(123456789012345678901234567890n);
  });

  it('rejects negatives, decimals and numbers', () => {
    expect(AmountSchema.safeParse('-1').success).toBe(false);
    expect(AmountSchema.safeParse('1.5').success).toBe(false);
    expect(AmountSchema.safeParse(15).success).toBe(false);
    expect(SignedAmountSchema.parse('-7')).toBe(-7n);
  });
});

describe('numberKeyedMap', () => {
  it('restores numeric keys', () => {
    const map = numberKeyedMap(AmountSchema).parse({ '1': '10', '2': '20' });
    expect(map).toEqual(new Map([[1, 10n], [2, 20n]]));
    expect(numberKeyedMap(AmountSchema).safeParse({ pool: '10' }).success).toBe(false);
  });
});

describe('toJson', () => {
  it('converts bigints, maps and dates', () => {
    const value = {
      amount: 5n,
      when: new Date('2024-01-01T00:00:00.000Z'),
      byPool: new Map([[1, { balance: 7n, note: undefined }]]),
      list: [1n, 'a', null],
    };
    expect(toJson(value)).toEqual({
      amount: '5',
      when: '2024-01-01T00:00:00.000Z',
      byPool: { '1': { balance: '7' } },
      list: ['1', 'a', null],
    });
  });
});

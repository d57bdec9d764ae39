/**
 * Lending Hub - Wire Codec
 *
 * JSON has no bigint and no Map: amounts travel as decimal strings and
 * maps as objects keyed by their stringified keys.
 */

import { z } from 'zod';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const IntStringSchema = z.string().regex(/^-?\d+$/);

/** Non-negative integer amount as a decimal string */
export const AmountSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a non-negative integer string')
  .transform((value) => BigInt(value));

export const SignedAmountSchema = IntStringSchema.transform((value) => BigInt(value));

export const PoolIdSchema = z.number().int().nonnegative();

/**
 * Map keyed by numeric ids, stored as an object with string keys
 */
export function numberKeyedMap<T extends z.ZodTypeAny>(value: T) {
  return z
    .record(z.string().regex(/^\d+$/), value)
    .transform((record) => new Map(Object.entries(record).map(([key, entry]) => [Number(key), entry] as const)));
}

export function stringKeyedMap<T extends z.ZodTypeAny>(value: T) {
  return z
    .record(z.string(), value)
    .transform((record) => new Map(Object.entries(record)));
}

/**
 * Deep copy with bigints as strings, Maps as objects and Dates as ISO strings.
 * Undefined object fields are dropped.
 */
export function toJson(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((entry) => toJson(entry));
  if (value instanceof Map) {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of value) out[String(key)] = toJson(entry);
    return out;
  }
  if (typeof value === 'object') {
    const out: { [key: string]: JsonValue } = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) out[key] = toJson(entry);
    }
    return out;
  }
  return null;
}

/***
 * Hash — Default hashing and key equality for UnorderedMap.
 *
 * A HashFn maps a key to a non-negative integer; the map reduces it
 * modulo the bucket count. An EqualsFn decides whether two keys are the
 * same key. The two must agree: keys that compare equal must hash alike.
 *
 * default_hash covers every JavaScript value:
 *
 *   number     integers in the 32-bit range → fmix32, others → FNV-1a of String(n)
 *   string     FNV-1a over UTF-16 code units
 *   boolean    fmix32 of 0 / 1
 *   bigint     FNV-1a of its decimal form
 *   object     identity (per-object id held in a WeakMap)
 *   symbol     identity (per-symbol id held in a Map)
 *   null / undefined  fixed constants
 *
 * default_equals is SameValueZero, the equality the built-in Map uses:
 * NaN equals NaN and -0 equals 0. default_hash agrees with it.
 *
 ***/

import {
  FNV_OFFSET_BASIS,
  FNV_PRIME,
  MIX_MULTIPLIER_A,
  MIX_MULTIPLIER_B,
  NULL_HASH,
  UNDEFINED_HASH,
} from "utils/constants";

export type HashFn<K> = (key: K) => number;
export type EqualsFn<K> = (a: K, b: K) => boolean;

/** murmur3 finalizer. Returns an unsigned 32-bit integer. */
export function mix_int32(h: number): number {
  h ^= h >>> 16;
  h = Math.imul(h, MIX_MULTIPLIER_A);
  h ^= h >>> 13;
  h = Math.imul(h, MIX_MULTIPLIER_B);
  h ^= h >>> 16;
  return h >>> 0;
}

/** FNV-1a over UTF-16 code units. Returns an unsigned 32-bit integer. */
export function hash_string(s: string): number {
  let h = FNV_OFFSET_BASIS;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, FNV_PRIME);
  }
  return h >>> 0;
}

export function hash_number(n: number): number {
  // -0 | 0 is 0, so -0 and 0 land on the same hash
  if (n === (n | 0) || n === n >>> 0) return mix_int32(n | 0);
  return hash_string(String(n));
}

// Identity ids. Objects are held weakly; symbols cannot be WeakMap keys
// on every runtime we target, so they are held strongly.
const object_ids = new WeakMap<object, number>();
const symbol_ids = new Map<symbol, number>();
let next_identity_id = 1;

function identity_id_of(key: object): number {
  let id = object_ids.get(key);
  if (id === undefined) {
    id = next_identity_id++;
    object_ids.set(key, id);
  }
  return id;
}

function symbol_id_of(key: symbol): number {
  let id = symbol_ids.get(key);
  if (id === undefined) {
    id = next_identity_id++;
    symbol_ids.set(key, id);
  }
  return id;
}

export function default_hash(key: unknown): number {
  switch (typeof key) {
    case "number":
      return hash_number(key);
    case "string":
      return hash_string(key);
    case "boolean":
      return mix_int32(key ? 1 : 0);
    case "bigint":
      return hash_string(key.toString());
    case "symbol":
      return mix_int32(symbol_id_of(key));
    case "undefined":
      return UNDEFINED_HASH;
    case "object":
      if (key === null) return NULL_HASH;
      return mix_int32(identity_id_of(key));
    case "function":
      return mix_int32(identity_id_of(key));
  }
  return 0;
}

/** SameValueZero. */
export function default_equals(a: unknown, b: unknown): boolean {
  // NaN is the only value not equal to itself
  return a === b || (a !== a && b !== b);
}

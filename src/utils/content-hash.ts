/**
 * Deterministic content hashing for generated identifiers
 */

import type { JsonValue } from "../types/data-model.js";

const FNV64_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV64_PRIME = 0x100000001b3n;
const GENERATED_ID_BITS = 53;

/**
 * Serialize a JSON value with object keys in sorted order, at every depth
 *
 * @example
 * canonicalStringify({ b: 1, a: [{ d: 2, c: 3 }] })
 * // Returns: '{"a":[{"c":3,"d":2}],"b":1}'
 */
export function canonicalStringify(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map(canonicalStringify).join(",")}]`;
  }

  const keys = Object.keys(value).sort();
  const parts: string[] = [];
  for (const key of keys) {
    const child = value[key];
    if (child !== undefined) {
      parts.push(`${JSON.stringify(key)}:${canonicalStringify(child)}`);
    }
  }
  return `{${parts.join(",")}}`;
}

/**
 * 64-bit FNV-1a over the UTF-8 bytes of the input
 */
export function fnv1a64(input: string): bigint {
  let hash = FNV64_OFFSET_BASIS;
  for (const byte of Buffer.from(input, "utf8")) {
    hash ^= BigInt(byte);
    hash = BigInt.asUintN(64, hash * FNV64_PRIME);
  }
  return hash;
}

/**
 * Hash a JSON value into a non-negative safe integer.
 * Identical content yields the same id in every run and every document.
 */
export function contentHash(value: JsonValue): number {
  return Number(
    BigInt.asUintN(GENERATED_ID_BITS, fnv1a64(canonicalStringify(value))),
  );
}

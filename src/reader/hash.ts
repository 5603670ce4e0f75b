/**
 * Value Hashing
 */

const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/**
 * 32-bit FNV-1a hash over the UTF-16 code units of `value`.
 * Used by TokenReader to compare token values by hash.
 */
export function hashValue(value: string): number {
  let hash = FNV_OFFSET_BASIS >>> 0;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Deterministic colors for identifiers.
 *
 * Join sets and child executions are tinted with a color derived from a
 * hash of their id so the same id looks the same everywhere in the UI.
 * Pure functions, no shared state.
 */

const FNV_OFFSET_BASIS = 0xcbf29ce484222325n;
const FNV_PRIME = 0x100000001b3n;
const MASK_64 = 0xffffffffffffffffn;

/** 64-bit FNV-1a over the UTF-16 code units of `input`. */
export function hashString(input: string): bigint {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= BigInt(input.charCodeAt(i));
    hash = (hash * FNV_PRIME) & MASK_64;
  }
  return hash;
}

/**
 * Hue spans the full circle, saturation 70-100% and lightness 65-85%
 * (readable on a dark background).
 */
export function generateColorFromHash(hash: bigint): string {
  const h = hash % 360n;
  const s = 70n + ((hash >> 16n) % 31n);
  const l = 65n + ((hash >> 32n) % 21n);
  return `hsl(${h}, ${s}%, ${l}%)`;
}

export function generateColor(input: string): string {
  return generateColorFromHash(hashString(input));
}

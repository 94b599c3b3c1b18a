/**
 * Hash helpers for the value model.
 *
 * Multiply-by-31 hashing over 32-bit integers, so that equal
 * values produce equal hash codes regardless of how they were built.
 */

export function hashString(text: string): number {
  let hash = 0;
  for (let i = 0; i < text.length; i++) {
    hash = (Math.imul(31, hash) + text.charCodeAt(i)) | 0;
  }
  return hash;
}

export function hashNumber(value: number): number {
  // -0 and 0 are equal under ===, and both print as "0"
  return hashString(String(value));
}

export function hashCombine(...hashes: number[]): number {
  let result = 1;
  for (const hash of hashes) {
    result = (Math.imul(31, result) + hash) | 0;
  }
  return result;
}

/** FNV-1a (32-bit). Stands in for randomness wherever output must be reproducible. */
export function hashString(input: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/** Picks an item from a non-empty list, keyed by the seed text */
export function pickBySeed<T>(items: readonly [T, ...T[]], seed: string): T {
  const index = hashString(seed) % items.length;
  return items[index] ?? items[0];
}

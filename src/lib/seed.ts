/**
 * Deterministic seeding for template selection.
 *
 * Seeds come from a stable item key (the news url), never from the clock,
 * so the same item produces the same draft in every process.
 */

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/** Stride between variant seeds. Brand template loading rejects grid sizes that share a factor with it. */
export const VARIANT_STRIDE = 7;

/** FNV-1a (32-bit) over the UTF-8 bytes of `key`. */
export function fnv1a32(key: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (const byte of Buffer.from(key, "utf8")) {
    hash ^= byte;
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function draftSeed(key: string): number {
  return fnv1a32(key);
}

export function variantSeed(baseSeed: number, index: number): number {
  return baseSeed + index * VARIANT_STRIDE;
}

/** Index into a pool of `size` entries. Always in [0, size). */
export function selectIndex(seed: number, size: number): number {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Pool size must be a positive integer, got ${size}`);
  }
  return ((Math.trunc(seed) % size) + size) % size;
}

export function pick<T>(pool: readonly T[], seed: number): T {
  return pool[selectIndex(seed, pool.length)];
}

/**
 * Pick a hook and a CTA jointly over the hooks x ctas grid.
 * Variant seeds base + i * VARIANT_STRIDE land on distinct cells for every
 * i below the grid size, provided the grid size is coprime with the stride.
 */
export function pickPair<A, B>(
  hooks: readonly A[],
  ctas: readonly B[],
  seed: number
): { hook: A; cta: B } {
  const cell = selectIndex(seed, hooks.length * ctas.length);
  return {
    hook: hooks[cell % hooks.length],
    cta: ctas[Math.floor(cell / hooks.length)],
  };
}

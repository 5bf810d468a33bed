/**
 * Seeded sampling for test-mode runs. The same seed picks the same rows on every run.
 */

/** Small deterministic PRNG returning floats in [0, 1) */
export function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Pick `size` distinct indices out of `total`, returned in ascending order
 */
export function sampleIndices(total: number, size: number, seed: number): number[] {
  const indices = Array.from({ length: total }, (_, i) => i);
  if (size >= total) {
    return indices;
  }

  const random = mulberry32(seed);
  // Partial Fisher-Yates: the first `size` slots end up as the sample
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(random() * (total - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices.slice(0, size).sort((a, b) => a - b);
}

/** Sample rows, keeping their manifest order */
export function sampleRows<T>(rows: readonly T[], size: number, seed: number): T[] {
  return sampleIndices(rows.length, size, seed).map((index) => rows[index]);
}

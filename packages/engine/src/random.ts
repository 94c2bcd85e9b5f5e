/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: RandomSource = Math.random): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

/**
 * Uniform random subset of `count` items, returned in their original order.
 */
export function sample<T>(items: readonly T[], count: number, random: RandomSource = Math.random): T[] {
  if (count >= items.length) return [...items];
  const picked = shuffle(items.map((_, i) => i), random)
    .slice(0, Math.max(0, count))
    .sort((a, b) => a - b);
  return picked.map((i) => items[i]);
}

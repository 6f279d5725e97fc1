/**
 * Matchmaking - Random Choice
 */

export interface RandomSource {
  /** Uniform float in [0, 1) */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

export function choice<T>(items: readonly T[], random: RandomSource = mathRandom): T {
  if (items.length === 0) {
    throw new Error("Cannot choose from an empty list");
  }
  const index = Math.min(Math.floor(random.next() * items.length), items.length - 1);
  return items[index];
}

/**
 * Cumulative-weight sampling. Negative weights count as zero; at least one
 * weight must be positive.
 */
export function weightedChoice<T>(
  items: readonly T[],
  weights: readonly number[],
  random: RandomSource = mathRandom
): T {
  if (items.length === 0) {
    throw new Error("Cannot choose from an empty list");
  }
  if (items.length !== weights.length) {
    throw new Error(`Expected ${items.length} weights, got ${weights.length}`);
  }

  const clamped = weights.map((w) => Math.max(w, 0));
  const total = clamped.reduce((sum, w) => sum + w, 0);
  if (total <= 0) {
    throw new Error("Total weight must be positive");
  }

  const target = random.next() * total;
  let cumulative = 0;
  for (let i = 0; i < items.length; i++) {
    cumulative += clamped[i];
    if (target < cumulative) return items[i];
  }

  // Float rounding can leave target at the very top; take the last positive
  for (let i = items.length - 1; i >= 0; i--) {
    if (clamped[i] > 0) return items[i];
  }
  return items[items.length - 1];
}

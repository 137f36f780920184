import { InvalidDistributionError } from "./errors.js";
import type { RandomSource, WeightMap } from "./types.js";

export type NormalizedWeight = {
  readonly label: string;
  readonly probability: number;
};

const toEffectiveWeight = (value: number): number => {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }

  return value;
};

/**
 * Turns a weight mapping into probabilities that sum to 1, in key order.
 *
 * Negative and non-finite weights count as zero. When nothing positive is
 * left the result is uniform over the labels.
 */
export const normalizeWeights = (
  weights: WeightMap,
  distribution = "weights"
): NormalizedWeight[] => {
  const labels = Object.keys(weights);
  if (labels.length === 0) {
    throw new InvalidDistributionError(distribution);
  }

  const effective = labels.map((label) => toEffectiveWeight(weights[label] ?? 0));
  const total = effective.reduce((sum, value) => sum + value, 0);

  if (total <= 0) {
    const uniform = 1 / labels.length;
    return labels.map((label) => ({ label, probability: uniform }));
  }

  return labels.map((label, index) => ({
    label,
    probability: (effective[index] ?? 0) / total,
  }));
};

/** Draws one label with probability proportional to its weight. */
export const sampleWeighted = (
  weights: WeightMap,
  random: RandomSource = Math.random,
  distribution = "weights"
): string => {
  const normalized = normalizeWeights(weights, distribution);
  const roll = random();

  let cumulative = 0;
  let lastDrawable: string | undefined;
  for (const entry of normalized) {
    if (entry.probability <= 0) {
      continue;
    }

    cumulative += entry.probability;
    lastDrawable = entry.label;
    if (roll < cumulative) {
      return entry.label;
    }
  }

  // float rounding can leave cumulative a hair under 1
  if (lastDrawable === undefined) {
    throw new InvalidDistributionError(distribution);
  }

  return lastDrawable;
};

export const assertUsableDistribution = (weights: WeightMap, distribution: string): void => {
  normalizeWeights(weights, distribution);
};

/** Picks `count` distinct items, keeping the pool untouched. */
export const sampleWithoutReplacement = <T>(
  pool: readonly T[],
  count: number,
  random: RandomSource = Math.random
): T[] => {
  const remaining = [...pool];
  const picked: T[] = [];
  const target = Math.min(Math.max(0, Math.floor(count)), remaining.length);

  while (picked.length < target) {
    const index = Math.min(remaining.length - 1, Math.floor(random() * remaining.length));
    const [item] = remaining.splice(index, 1);
    if (item !== undefined) {
      picked.push(item);
    }
  }

  return picked;
};

import type { CatalogItem, RarityTier } from './types.js';
import { NotFoundError } from './errors.js';

/**
 * Uniform source on [0, 1)
 */
export type UniformSource = () => number;

export function totalWeight(entries: readonly { weight: number }[]): number {
  return entries.reduce((sum, entry) => sum + entry.weight, 0);
}

/**
 * Cumulative-weight walk: returns the first entry whose running total exceeds `u`
 *
 * @param entries - Weighted entries in table order
 * @param u - Point in [0, totalWeight)
 */
export function pickWeighted<T extends { weight: number }>(entries: readonly T[], u: number): T {
  if (entries.length === 0) {
    throw new NotFoundError('Nothing to draw from.');
  }
  let cumulative = 0;
  for (const entry of entries) {
    cumulative += entry.weight;
    if (u < cumulative) {
      return entry;
    }
  }
  return entries[entries.length - 1];
}

function pickUniform<T>(entries: readonly T[], random: UniformSource): T {
  const index = Math.min(entries.length - 1, Math.floor(random() * entries.length));
  return entries[index];
}

/**
 * Draw one item from a case's pool
 *
 * A rarity tier is chosen by weight, then an item uniformly among the pool's
 * items of that tier. When the pool has nothing of the chosen tier, the item is
 * picked uniformly from the whole pool.
 *
 * @param pool - Items of the case's collections
 * @param rarities - Rarity table in order
 * @param random - Uniform source
 */
export function drawItem(pool: readonly CatalogItem[], rarities: readonly RarityTier[], random: UniformSource): CatalogItem {
  if (pool.length === 0) {
    throw new NotFoundError('This case has no items to draw.');
  }

  const tier = pickWeighted(rarities, random() * totalWeight(rarities));
  const ofTier = pool.filter((item) => item.rarity === tier.tag);
  return pickUniform(ofTier.length > 0 ? ofTier : pool, random);
}

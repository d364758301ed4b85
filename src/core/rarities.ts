/**
 * Rarity table lookups
 */

import { RARITY_TIERS, type Rarity } from '../models/enums.js';
import { CollectionError, CollectionErrorCode } from './errors.js';

const MAX_SUPPLY = new Map<string, bigint>(RARITY_TIERS);

export const RARITIES: readonly Rarity[] = RARITY_TIERS.map(([name]) => name);

export function isRarity(value: unknown): value is Rarity {
  return typeof value === 'string' && MAX_SUPPLY.has(value);
}

/**
 * Maximum issuable supply of a rarity tier
 * @throws CollectionError INVALID_RARITY for unknown tiers
 */
export function getRarityValue(rarity: string): bigint {
  const supply = MAX_SUPPLY.get(rarity);
  if (supply === undefined) {
    throw new CollectionError(CollectionErrorCode.INVALID_RARITY, 'getRarityValue');
  }
  return supply;
}

/**
 * Rarity name at a table index
 */
export function getRarityName(index: number): Rarity {
  const rarity = RARITIES[index];
  if (!Number.isInteger(index) || rarity === undefined) {
    throw new CollectionError(CollectionErrorCode.INVALID_RARITY, 'getRarityName');
  }
  return rarity;
}

export function getRarityIndex(rarity: string): number {
  const index = RARITIES.findIndex((name) => name === rarity);
  if (index < 0) {
    throw new CollectionError(CollectionErrorCode.INVALID_RARITY, 'getRarityIndex');
  }
  return index;
}

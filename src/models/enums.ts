/**
 * Rarity tiers in catalogue order. The position of a tier is its on-chain
 * index; the value is the maximum number of tokens an item of that tier
 * can ever issue.
 */
export const RARITY_TIERS = [
  ['common', 100_000n],
  ['uncommon', 10_000n],
  ['rare', 5_000n],
  ['epic', 1_000n],
  ['legendary', 100n],
  ['mythic', 5n],
  ['unique', 1n],
] as const;

export type Rarity = (typeof RARITY_TIERS)[number][0];

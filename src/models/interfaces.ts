/**
 * Core interfaces for the collection platform
 */

import type { Address } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import type { Rarity } from './enums.js';
import type { EventLog } from './events.js';

/**
 * Catalogue entry. Records are immutable; writes replace the whole record.
 */
export interface Item {
  readonly rarity: Rarity;
  readonly maxSupply: bigint;
  readonly totalSupply: bigint;
  readonly price: bigint;
  readonly beneficiary: Address;
  readonly metadata: string;
  readonly contentHash: Hex;
}

/**
 * Item as submitted to addItems or initialize
 */
export interface ItemInput {
  rarity: string; // rarity name, validated against the rarity table
  price: bigint;
  beneficiary: Address;
  metadata: string;
  totalSupply?: bigint; // must be 0 when given
  contentHash?: Hex; // must be EMPTY_HASH when given
}

/**
 * Remaining uses of a per-item minter grant
 */
export type MinterAllowance =
  | { kind: 'finite'; remaining: bigint }
  | { kind: 'unlimited' };

export interface TxOptions {
  from: Address;
}

/**
 * Result of a committed call: its return value and the events emitted inside it
 */
export interface Receipt<T> {
  value: T;
  logs: EventLog[];
}

export interface CollectionInitParams {
  name: string;
  symbol: string;
  baseURI: string;
  creator: Address;
  shouldComplete: boolean;
  proofOfCreation?: Hex;
  items?: ItemInput[];
}

export interface DecodedTokenId {
  itemId: bigint;
  issuedId: bigint;
}

export interface ChainConfig {
  chainId?: number;
  timestamp?: number; // genesis block time, unix seconds
}

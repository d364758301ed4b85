/**
 * Shared accounts, items and deploy helpers for collection tests
 */

import { expect } from '@jest/globals';
import { Chain } from '../../src/core/chain.js';
import { ERC721CollectionV2 } from '../../src/core/collection.js';
import { ERC721CollectionFactoryV2 } from '../../src/core/collection-factory.js';
import { CallFailedError, CollectionError, type CollectionErrorCode } from '../../src/core/errors.js';
import type { CollectionInitParams, ItemInput } from '../../src/models/interfaces.js';
import type { Address } from '../../src/utils/address.js';
import type { Hex } from '../../src/utils/buffer-utils.js';
import { GRACE_PERIOD, ZERO_ADDRESS } from '../../src/utils/constants.js';
import { addressFromPrivateKey } from '../../src/utils/signing.js';

export const GENESIS_TIMESTAMP = 1_700_000_000;
export const CHAIN_ID = 1337;
export const BASE_URI = 'https://api.example.test/v2/';

/** Placeholder private keys 1..n */
export function testKey(n: number): Hex {
  return `0x${n.toString(16).padStart(64, '0')}`;
}

export const KEYS = {
  deployer: testKey(1),
  user: testKey(2),
  creator: testKey(3),
  minter: testKey(4),
  manager: testKey(5),
  holder: testKey(6),
  anotherHolder: testKey(7),
  beneficiary: testKey(8),
  hacker: testKey(9),
  relayer: testKey(10),
  operator: testKey(11),
  factoryOwner: testKey(12),
} as const;

export const accounts = {
  deployer: addressFromPrivateKey(KEYS.deployer),
  user: addressFromPrivateKey(KEYS.user),
  creator: addressFromPrivateKey(KEYS.creator),
  minter: addressFromPrivateKey(KEYS.minter),
  manager: addressFromPrivateKey(KEYS.manager),
  holder: addressFromPrivateKey(KEYS.holder),
  anotherHolder: addressFromPrivateKey(KEYS.anotherHolder),
  beneficiary: addressFromPrivateKey(KEYS.beneficiary),
  hacker: addressFromPrivateKey(KEYS.hacker),
  relayer: addressFromPrivateKey(KEYS.relayer),
  operator: addressFromPrivateKey(KEYS.operator),
  factoryOwner: addressFromPrivateKey(KEYS.factoryOwner),
};

/** Same account with its hex digits upper-cased */
export function shouted(address: Address): Address {
  return `0x${address.slice(2).toUpperCase()}`;
}

export function salt(n: number): Hex {
  return `0x${n.toString(16).padStart(64, '0')}`;
}

export const ITEMS: ItemInput[] = [
  {
    rarity: 'common',
    price: 100n,
    beneficiary: accounts.beneficiary,
    metadata: '1:turtle_neck_sweater:upper_body:BaseMale,BaseFemale',
  },
  {
    rarity: 'mythic',
    price: 0n,
    beneficiary: ZERO_ADDRESS,
    metadata: '1:tiara:hat:BaseFemale',
  },
  {
    rarity: 'unique',
    price: 5n,
    beneficiary: accounts.beneficiary,
    metadata: '1:golden_crown:hat:BaseMale',
  },
];

export function newChain(): Chain {
  return new Chain({ chainId: CHAIN_ID, timestamp: GENESIS_TIMESTAMP });
}

export function deployImplementation(chain: Chain): ERC721CollectionV2 {
  return chain.deploy(accounts.deployer, (address) => new ERC721CollectionV2(chain, address)).value;
}

export function deployFactory(
  chain: Chain,
  owner: Address = accounts.factoryOwner
): { implementation: ERC721CollectionV2; factory: ERC721CollectionFactoryV2 } {
  const implementation = deployImplementation(chain);
  const factory = chain.deploy(
    accounts.deployer,
    (address) => new ERC721CollectionFactoryV2(chain, address, { implementation: implementation.address, owner })
  ).value;
  return { implementation, factory };
}

export function initParams(overrides: Partial<CollectionInitParams> = {}): CollectionInitParams {
  return {
    name: 'Test Collection',
    symbol: 'TCOL',
    baseURI: BASE_URI,
    creator: accounts.creator,
    shouldComplete: false,
    items: ITEMS,
    ...overrides,
  };
}

export interface CollectionSetup {
  chain: Chain;
  factory: ERC721CollectionFactoryV2;
  collection: ERC721CollectionV2;
}

/**
 * Collection created through the factory by `user`, owned by the factory owner
 */
export function setupCollection(overrides: Partial<CollectionInitParams> = {}): CollectionSetup {
  const chain = newChain();
  const { factory } = deployFactory(chain);
  const collection = factory.createCollection(salt(1), initParams(overrides), { from: accounts.user }).value;
  return { chain, factory, collection };
}

/**
 * Completed collection past its grace period
 */
export function setupMintableCollection(overrides: Partial<CollectionInitParams> = {}): CollectionSetup {
  const setup = setupCollection({ shouldComplete: true, ...overrides });
  setup.chain.increaseTime(GRACE_PERIOD);
  return setup;
}

/**
 * Run `fn` and return the CollectionError it throws, asserting its code
 */
export function expectRevert(fn: () => unknown, code: CollectionErrorCode): CollectionError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(CollectionError);
  if (!(caught instanceof CollectionError)) {
    throw new Error('expected a CollectionError');
  }
  expect(caught.code).toBe(code);
  return caught;
}

/**
 * Run `fn` and return the CallFailedError it throws. With `innerCode`, the
 * wrapped cause must be a CollectionError with that code.
 */
export function expectCallFailed(fn: () => unknown, innerCode?: CollectionErrorCode): CallFailedError {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(CallFailedError);
  if (!(caught instanceof CallFailedError)) {
    throw new Error('expected a CallFailedError');
  }
  if (innerCode !== undefined) {
    const cause = caught.cause;
    expect(cause).toBeInstanceOf(CollectionError);
    if (cause instanceof CollectionError) {
      expect(cause.code).toBe(innerCode);
    }
  }
  return caught;
}

/**
 * Item catalogue
 *
 * Dense, zero-based list of items. Callers check authorization and
 * lifecycle; the catalogue enforces the per-item invariants:
 * totalSupply <= maxSupply, (price == 0) <=> (beneficiary == 0),
 * non-empty metadata, and an empty content hash unless rescued.
 */

import type { ContractEvent } from '../models/events.js';
import type { Item, ItemInput } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import { type Hex, isBytes32 } from '../utils/buffer-utils.js';
import { EMPTY_HASH, UINT256_MAX, ZERO_ADDRESS } from '../utils/constants.js';
import { CollectionErrorCode, ensure } from './errors.js';
import { getRarityValue, isRarity } from './rarities.js';
import { StorageList, type Journal } from './storage.js';
import { toBigInt } from './utils.js';

export class ItemCatalogue {
  private readonly items: StorageList<Item>;
  private readonly emit: (event: ContractEvent) => void;

  constructor(journal: Journal, emit: (event: ContractEvent) => void) {
    this.items = new StorageList(journal);
    this.emit = emit;
  }

  count(): bigint {
    return BigInt(this.items.length);
  }

  get(itemId: bigint | number): Item | undefined {
    const id = toBigInt(itemId, 'itemId');
    if (id < 0n || id >= BigInt(this.items.length)) {
      return undefined;
    }
    return this.items.at(Number(id));
  }

  /**
   * @throws CollectionError ITEM_DOES_NOT_EXIST
   */
  require(itemId: bigint | number, scope: string): Item {
    const item = this.get(itemId);
    ensure(item !== undefined, CollectionErrorCode.ITEM_DOES_NOT_EXIST, scope);
    return item;
  }

  all(): Item[] {
    return this.items.toArray();
  }

  add(input: ItemInput, scope: string): bigint {
    const rarity = input.rarity;
    ensure(isRarity(rarity), CollectionErrorCode.INVALID_RARITY, scope);
    ensure((input.totalSupply ?? 0n) === 0n, CollectionErrorCode.INVALID_TOTAL_SUPPLY, scope);
    const beneficiary = checkSalesData(input.price, input.beneficiary, scope);
    ensure(input.metadata.length > 0, CollectionErrorCode.EMPTY_METADATA, scope);
    ensure(
      input.contentHash === undefined || input.contentHash === EMPTY_HASH,
      CollectionErrorCode.CONTENT_HASH_SHOULD_BE_EMPTY,
      scope
    );

    const item: Item = {
      rarity,
      maxSupply: getRarityValue(rarity),
      totalSupply: 0n,
      price: input.price,
      beneficiary,
      metadata: input.metadata,
      contentHash: EMPTY_HASH,
    };
    const itemId = BigInt(this.items.push(item));
    this.emit({ event: 'AddItem', args: { itemId, item } });
    return itemId;
  }

  updateSalesData(itemId: bigint, price: bigint, account: Address, scope: string): void {
    const item = this.require(itemId, scope);
    const beneficiary = checkSalesData(price, account, scope);
    this.replace(itemId, { ...item, price, beneficiary });
    this.emit({ event: 'UpdateItemSalesData', args: { itemId, price, beneficiary } });
  }

  updateMetadata(itemId: bigint, metadata: string, scope: string): void {
    const item = this.require(itemId, scope);
    ensure(metadata.length > 0, CollectionErrorCode.EMPTY_METADATA, scope);
    this.replace(itemId, { ...item, metadata });
    this.emit({ event: 'UpdateItemMetadata', args: { itemId, metadata } });
  }

  /**
   * Owner correction path. An empty `metadata` keeps the current one.
   */
  rescue(itemId: bigint, contentHash: Hex, metadata: string, scope: string): void {
    const item = this.require(itemId, scope);
    ensure(isBytes32(contentHash), CollectionErrorCode.INVALID_CONTENT_HASH, scope);
    const nextMetadata = metadata.length > 0 ? metadata : item.metadata;
    this.replace(itemId, { ...item, contentHash, metadata: nextMetadata });
    this.emit({ event: 'RescueItem', args: { itemId, contentHash, metadata: nextMetadata } });
  }

  /**
   * Count one more issuance against an item
   * @returns the new total supply, which is the issued id
   * @throws CollectionError ITEM_EXHAUSTED at max supply
   */
  recordIssue(itemId: bigint, scope: string): bigint {
    const item = this.require(itemId, scope);
    ensure(item.totalSupply < item.maxSupply, CollectionErrorCode.ITEM_EXHAUSTED, scope);
    const totalSupply = item.totalSupply + 1n;
    this.replace(itemId, { ...item, totalSupply });
    return totalSupply;
  }

  private replace(itemId: bigint, item: Item): void {
    this.items.set(Number(itemId), item);
  }
}

/**
 * @returns the normalized beneficiary
 */
function checkSalesData(price: bigint, account: Address, scope: string): Address {
  ensure(price >= 0n && price <= UINT256_MAX, CollectionErrorCode.INVALID_PRICE, scope);
  const beneficiary = toAddress(account, scope);
  ensure(
    (price === 0n) === (beneficiary === ZERO_ADDRESS),
    CollectionErrorCode.INVALID_PRICE_AND_BENEFICIARY,
    scope
  );
  return beneficiary;
}

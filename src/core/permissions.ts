/**
 * Creator, minter and manager roles of a collection
 *
 * The creator is independent of the contract owner. Minters and managers
 * exist globally and per item; per-item minters hold an allowance.
 */

import type { ContractEvent } from '../models/events.js';
import type { MinterAllowance } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import { ZERO_ADDRESS } from '../utils/constants.js';
import { NO_ALLOWANCE, assertValidAllowance, consume, isUsable, sameAllowance } from './allowance.js';
import { CollectionErrorCode, ensure } from './errors.js';
import { type Journal, StorageMap, StorageSlot } from './storage.js';

function itemKey(itemId: bigint, account: Address): string {
  return `${itemId}:${toAddress(account, 'itemKey')}`;
}

export class PermissionRegistry {
  private readonly creatorSlot: StorageSlot<Address>;
  private readonly globalMinters: StorageMap<Address, boolean>;
  private readonly globalManagers: StorageMap<Address, boolean>;
  private readonly itemMinters: StorageMap<string, MinterAllowance>;
  private readonly itemManagers: StorageMap<string, boolean>;
  private readonly emit: (event: ContractEvent) => void;

  constructor(journal: Journal, emit: (event: ContractEvent) => void) {
    this.creatorSlot = new StorageSlot<Address>(journal, ZERO_ADDRESS);
    this.globalMinters = new StorageMap(journal);
    this.globalManagers = new StorageMap(journal);
    this.itemMinters = new StorageMap(journal);
    this.itemManagers = new StorageMap(journal);
    this.emit = emit;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  creator(): Address {
    return this.creatorSlot.get();
  }

  isCreator(account: Address): boolean {
    return toAddress(account, 'isCreator') === this.creatorSlot.get();
  }

  isGlobalMinter(account: Address): boolean {
    return this.globalMinters.get(toAddress(account, 'globalMinters')) ?? false;
  }

  isGlobalManager(account: Address): boolean {
    return this.globalManagers.get(toAddress(account, 'globalManagers')) ?? false;
  }

  itemMinterAllowance(itemId: bigint, account: Address): MinterAllowance {
    return this.itemMinters.get(itemKey(itemId, account)) ?? NO_ALLOWANCE;
  }

  isItemManager(itemId: bigint, account: Address): boolean {
    return this.itemManagers.get(itemKey(itemId, account)) ?? false;
  }

  /** Creator, global minter, or holder of a usable per-item allowance */
  canMint(account: Address, itemId: bigint): boolean {
    return (
      this.isCreator(account) ||
      this.isGlobalMinter(account) ||
      isUsable(this.itemMinterAllowance(itemId, account))
    );
  }

  /** Creator, global manager, or manager of the item */
  canManage(account: Address, itemId: bigint): boolean {
    return this.isCreator(account) || this.isGlobalManager(account) || this.isItemManager(itemId, account);
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  setCreator(creator: Address, scope: string): void {
    const newCreator = toAddress(creator, scope);
    ensure(newCreator !== ZERO_ADDRESS, CollectionErrorCode.INVALID_CREATOR_ADDRESS, scope);
    const previousCreator = this.creatorSlot.get();
    this.creatorSlot.set(newCreator);
    this.emit({ event: 'CreatorshipTransferred', args: { previousCreator, newCreator } });
  }

  setGlobalMinter(account: Address, value: boolean, scope: string): void {
    const minter = toAddress(account, scope);
    ensure(minter !== ZERO_ADDRESS, CollectionErrorCode.INVALID_MINTER_ADDRESS, scope);
    ensure(this.isGlobalMinter(minter) !== value, CollectionErrorCode.VALUE_IS_THE_SAME, scope);
    this.globalMinters.set(minter, value);
    this.emit({ event: 'SetGlobalMinter', args: { minter, value } });
  }

  setGlobalManager(account: Address, value: boolean, scope: string): void {
    const manager = toAddress(account, scope);
    ensure(manager !== ZERO_ADDRESS, CollectionErrorCode.INVALID_MANAGER_ADDRESS, scope);
    ensure(this.isGlobalManager(manager) !== value, CollectionErrorCode.VALUE_IS_THE_SAME, scope);
    this.globalManagers.set(manager, value);
    this.emit({ event: 'SetGlobalManager', args: { manager, value } });
  }

  setItemMinter(itemId: bigint, account: Address, allowance: MinterAllowance, scope: string): void {
    const minter = toAddress(account, scope);
    ensure(minter !== ZERO_ADDRESS, CollectionErrorCode.INVALID_MINTER_ADDRESS, scope);
    assertValidAllowance(allowance, scope);
    ensure(
      !sameAllowance(this.itemMinterAllowance(itemId, minter), allowance),
      CollectionErrorCode.VALUE_IS_THE_SAME,
      scope
    );
    this.itemMinters.set(itemKey(itemId, minter), allowance);
    this.emit({ event: 'SetItemMinter', args: { itemId, minter, allowance } });
  }

  setItemManager(itemId: bigint, account: Address, value: boolean, scope: string): void {
    const manager = toAddress(account, scope);
    ensure(manager !== ZERO_ADDRESS, CollectionErrorCode.INVALID_MANAGER_ADDRESS, scope);
    ensure(this.isItemManager(itemId, manager) !== value, CollectionErrorCode.VALUE_IS_THE_SAME, scope);
    this.itemManagers.set(itemKey(itemId, manager), value);
    this.emit({ event: 'SetItemManager', args: { itemId, manager, value } });
  }

  /**
   * Spend one use of the caller's per-item allowance. Creators and global
   * minters, and unlimited allowances, are never charged.
   */
  chargeMint(account: Address, itemId: bigint, scope: string): void {
    if (this.isCreator(account) || this.isGlobalMinter(account)) {
      return;
    }
    const allowance = this.itemMinterAllowance(itemId, account);
    ensure(isUsable(allowance), CollectionErrorCode.CALLER_CAN_NOT_MINT, scope);
    if (allowance.kind === 'finite') {
      this.itemMinters.set(itemKey(itemId, account), consume(allowance));
    }
  }
}

/**
 * Contract base classes
 */

import type { Chain } from './chain.js';
import type { Receipt, TxOptions } from '../models/interfaces.js';
import type { ContractEvent } from '../models/events.js';
import { type Address, toAddress } from '../utils/address.js';
import { ZERO_ADDRESS } from '../utils/constants.js';
import { CollectionErrorCode, ensure } from './errors.js';
import { StorageList, StorageMap, StorageSlot } from './storage.js';

/**
 * A contract living at a fixed address on a chain. All mutable state must
 * be kept in storage cells created through `map`, `slot` and `list` so that
 * reverted calls leave no trace.
 */
export abstract class Contract {
  readonly chain: Chain;
  readonly address: Address;

  constructor(chain: Chain, address: Address) {
    this.chain = chain;
    this.address = address;
  }

  protected emit(event: ContractEvent): void {
    this.chain.emit(this.address, event);
  }

  /**
   * Run a state-changing entry point as a call from `opts.from`
   */
  protected transact<T>(opts: TxOptions, body: (sender: Address) => T): Receipt<T> {
    return this.chain.call(opts.from, () => body(this.chain.msgSender()));
  }

  protected map<K, V>(): StorageMap<K, V> {
    return new StorageMap<K, V>(this.chain.journal);
  }

  protected slot<T>(initial: T): StorageSlot<T> {
    return new StorageSlot<T>(this.chain.journal, initial);
  }

  protected list<T>(): StorageList<T> {
    return new StorageList<T>(this.chain.journal);
  }
}

/**
 * Single transferable owner
 */
export abstract class Ownable extends Contract {
  private readonly ownerSlot = this.slot<Address>(ZERO_ADDRESS);

  owner(): Address {
    return this.ownerSlot.get();
  }

  transferOwnership(account: Address, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'Ownable#transferOwnership');
      const newOwner = toAddress(account, 'Ownable#transferOwnership');
      ensure(newOwner !== ZERO_ADDRESS, CollectionErrorCode.INVALID_ADDRESS, 'Ownable#transferOwnership');
      this.setOwner(newOwner);
    });
  }

  protected setOwner(account: Address): void {
    const newOwner = toAddress(account, 'Ownable#setOwner');
    const previousOwner = this.ownerSlot.get();
    this.ownerSlot.set(newOwner);
    this.emit({ event: 'OwnershipTransferred', args: { previousOwner, newOwner } });
  }

  protected onlyOwner(sender: Address, scope: string): void {
    ensure(sender === this.ownerSlot.get(), CollectionErrorCode.CALLER_IS_NOT_OWNER, scope);
  }
}

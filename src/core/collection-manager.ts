/**
 * Collection manager
 *
 * Charges a per-item fee for new collections, creates them through a
 * factory owned by a forwarder, and leaves them unapproved until the
 * committee approves them through `manageCollection`.
 */

import type { Chain } from './chain.js';
import type { ItemInput, Receipt, TxOptions } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import { ZERO_ADDRESS } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { deriveCreationSalt } from './addressing.js';
import type { ERC721CollectionV2 } from './collection.js';
import type { CollectionCall } from './collection-calls.js';
import { isCollectionFactory } from './collection-factory.js';
import { type Contract, Ownable } from './contract.js';
import { CallFailedError, CollectionErrorCode, ensure } from './errors.js';
import { isForwarder, type Forwarder } from './forwarder.js';
import { isFungibleToken } from './fungible-token.js';

export interface CollectionManagerParams {
  owner: Address;
  acceptedToken: Address;
  committee: Address;
  feesCollector: Address;
  pricePerItem: bigint;
}

export interface ManagedCollectionParams {
  forwarder: Address;
  factory: Address;
  salt: Hex;
  name: string;
  symbol: string;
  baseURI: string;
  creator: Address;
  items: ItemInput[];
}

export class CollectionManager extends Ownable {
  private readonly acceptedTokenSlot = this.slot<Address>(ZERO_ADDRESS);
  private readonly committeeSlot = this.slot<Address>(ZERO_ADDRESS);
  private readonly feesCollectorSlot = this.slot<Address>(ZERO_ADDRESS);
  private readonly pricePerItemSlot = this.slot(0n);

  constructor(chain: Chain, address: Address, params: CollectionManagerParams) {
    super(chain, address);
    this.setOwner(params.owner);
    this.writeAcceptedToken(params.acceptedToken);
    this.writeCommittee(params.committee);
    this.writeFeesCollector(params.feesCollector);
    this.writePricePerItem(params.pricePerItem);
  }

  acceptedToken(): Address {
    return this.acceptedTokenSlot.get();
  }

  committee(): Address {
    return this.committeeSlot.get();
  }

  feesCollector(): Address {
    return this.feesCollectorSlot.get();
  }

  pricePerItem(): bigint {
    return this.pricePerItemSlot.get();
  }

  setAcceptedToken(acceptedToken: Address, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setAcceptedToken');
      this.writeAcceptedToken(acceptedToken);
    });
  }

  setCommittee(committee: Address, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setCommittee');
      this.writeCommittee(committee);
    });
  }

  setFeesCollector(feesCollector: Address, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setFeesCollector');
      this.writeFeesCollector(feesCollector);
    });
  }

  setPricePerItem(pricePerItem: bigint, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setPricePerItem');
      this.writePricePerItem(pricePerItem);
    });
  }

  /**
   * Create a completed, unapproved collection for the caller.
   * The caller pays `pricePerItem × items.length` in the accepted token.
   */
  createCollection(params: ManagedCollectionParams, opts: TxOptions): Receipt<ERC721CollectionV2> {
    return this.transact(opts, (sender) => {
      const scope = 'createCollection';
      const fee = this.pricePerItemSlot.get() * BigInt(params.items.length);
      if (fee > 0n) {
        this.chargeFee(sender, fee, scope);
      }

      const factory = this.chain.contractAt(params.factory, isCollectionFactory);
      ensure(factory !== undefined, CollectionErrorCode.INVALID_ADDRESS, scope);
      const forwarder = this.requireForwarder(params.forwarder, scope);

      const salt = deriveCreationSalt(params.salt, sender);
      const { value: collection } = factory.createCollection(
        salt,
        {
          name: params.name,
          symbol: params.symbol,
          baseURI: params.baseURI,
          creator: params.creator,
          shouldComplete: true,
          proofOfCreation: deriveCreationSalt(salt, this.address),
          items: params.items,
        },
        { from: this.address }
      );

      forwarder.forwardCall(collection.address, { method: 'setApproved', args: { value: false } }, { from: this.address });
      logger.info('Managed collection created', `address=${collection.address} creator=${params.creator} fee=${fee}`);
      return collection;
    });
  }

  /**
   * Committee entry point: forward `call` to a collection created by `factory`
   */
  manageCollection(
    forwarder: Address,
    factory: Address,
    collection: Address,
    call: CollectionCall,
    opts: TxOptions
  ): Receipt<unknown> {
    return this.transact(opts, (sender) => {
      const scope = 'manageCollection';
      ensure(sender === this.committeeSlot.get(), CollectionErrorCode.UNAUTHORIZED_SENDER, scope);
      const collectionFactory = this.chain.contractAt(factory, isCollectionFactory);
      ensure(
        collectionFactory !== undefined && collectionFactory.isValidCollection(collection),
        CollectionErrorCode.INVALID_COLLECTION,
        scope
      );
      return this.requireForwarder(forwarder, scope).forwardCall(collection, call, { from: this.address }).value;
    });
  }

  private chargeFee(payer: Address, fee: bigint, scope: string): void {
    const token = this.chain.contractAt(this.acceptedTokenSlot.get(), isFungibleToken);
    ensure(token !== undefined, CollectionErrorCode.INVALID_ACCEPTED_TOKEN, scope);
    let transferred: boolean;
    try {
      transferred = token.transferFrom(payer, this.feesCollectorSlot.get(), fee, { from: this.address }).value;
    } catch (error) {
      throw new CallFailedError(scope, error);
    }
    if (!transferred) {
      throw new CallFailedError(scope, new Error('Accepted token transfer returned false'));
    }
    logger.info('Collection fee charged', `payer=${payer} amount=${fee}`);
  }

  private requireForwarder(address: Address, scope: string): Forwarder {
    const forwarder = this.chain.contractAt(address, isForwarder);
    ensure(forwarder !== undefined, CollectionErrorCode.INVALID_ADDRESS, scope);
    return forwarder;
  }

  private writeAcceptedToken(account: Address): void {
    const newAcceptedToken = toAddress(account, 'setAcceptedToken');
    ensure(newAcceptedToken !== ZERO_ADDRESS, CollectionErrorCode.INVALID_ACCEPTED_TOKEN, 'setAcceptedToken');
    const oldAcceptedToken = this.acceptedTokenSlot.get();
    this.acceptedTokenSlot.set(newAcceptedToken);
    this.emit({ event: 'AcceptedTokenSet', args: { oldAcceptedToken, newAcceptedToken } });
  }

  private writeCommittee(account: Address): void {
    const newCommittee = toAddress(account, 'setCommittee');
    ensure(newCommittee !== ZERO_ADDRESS, CollectionErrorCode.INVALID_COMMITTEE, 'setCommittee');
    const oldCommittee = this.committeeSlot.get();
    this.committeeSlot.set(newCommittee);
    this.emit({ event: 'CommitteeSet', args: { oldCommittee, newCommittee } });
  }

  private writeFeesCollector(account: Address): void {
    const newFeesCollector = toAddress(account, 'setFeesCollector');
    ensure(newFeesCollector !== ZERO_ADDRESS, CollectionErrorCode.INVALID_FEES_COLLECTOR, 'setFeesCollector');
    const oldFeesCollector = this.feesCollectorSlot.get();
    this.feesCollectorSlot.set(newFeesCollector);
    this.emit({ event: 'FeesCollectorSet', args: { oldFeesCollector, newFeesCollector } });
  }

  private writePricePerItem(newPricePerItem: bigint): void {
    ensure(newPricePerItem >= 0n, CollectionErrorCode.INVALID_PRICE, 'setPricePerItem');
    const oldPricePerItem = this.pricePerItemSlot.get();
    this.pricePerItemSlot.set(newPricePerItem);
    this.emit({ event: 'PricePerItemSet', args: { oldPricePerItem, newPricePerItem } });
  }
}

export function isCollectionManager(contract: Contract): contract is CollectionManager {
  return contract instanceof CollectionManager;
}

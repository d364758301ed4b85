/**
 * In-process ledger
 *
 * Holds every deployed contract, the block clock and the call stack. Calls
 * are strictly serialized: a top-level call is a transaction that commits or
 * reverts as a whole, nested calls revert only their own writes.
 */

import type { Contract } from './contract.js';
import type { ChainConfig, Receipt } from '../models/interfaces.js';
import type { ContractEvent, EventLog } from '../models/events.js';
import { type Address, toAddress } from '../utils/address.js';
import { DEFAULTS, ZERO_ADDRESS } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { computeCreateAddress } from './addressing.js';
import { CollectionError, CollectionErrorCode, ensure } from './errors.js';
import { Journal, StorageMap } from './storage.js';

export class Chain {
  readonly chainId: number;
  readonly journal: Journal;
  private readonly accounts: StorageMap<Address, Contract>;
  private readonly nonces: StorageMap<Address, number>;
  private readonly frames: Address[] = [];
  private logs: EventLog[] = [];
  private timestamp: number;
  private transactionCount = 0;

  constructor(config: ChainConfig = {}) {
    this.chainId = config.chainId ?? DEFAULTS.CHAIN_ID;
    this.timestamp = config.timestamp ?? Math.floor(Date.now() / 1000);
    this.journal = new Journal();
    this.accounts = new StorageMap(this.journal);
    this.nonces = new StorageMap(this.journal);
  }

  // ==========================================================================
  // Clock
  // ==========================================================================

  /** Current block time in unix seconds */
  now(): number {
    return this.timestamp;
  }

  /**
   * Advance the block clock. Only allowed between transactions.
   */
  increaseTime(seconds: number): void {
    ensure(this.frames.length === 0, CollectionErrorCode.CALL_IN_PROGRESS, 'Chain#increaseTime');
    ensure(Number.isInteger(seconds) && seconds >= 0, CollectionErrorCode.INVALID_TIME, 'Chain#increaseTime');
    this.timestamp += seconds;
  }

  // ==========================================================================
  // Calls
  // ==========================================================================

  /**
   * Run `body` with `from` as the message sender. Any error thrown inside
   * undoes every write and event made by the call before it propagates.
   * The zero address never sends.
   */
  call<T>(from: Address, body: () => T): Receipt<T> {
    const sender = toAddress(from, 'Chain#call');
    ensure(sender !== ZERO_ADDRESS, CollectionErrorCode.UNAUTHORIZED_SENDER, 'Chain#call');
    const topLevel = this.frames.length === 0;
    const mark = this.journal.mark();
    const logStart = this.logs.length;

    this.frames.push(sender);
    try {
      const value = body();
      const logs = this.logs.slice(logStart);
      if (topLevel) {
        this.journal.commit();
        this.logs = [];
        this.transactionCount++;
        logger.debug(`Transaction #${this.transactionCount} committed`, `from=${sender} events=${logs.length}`);
      }
      return { value, logs };
    } catch (error) {
      this.journal.revertTo(mark);
      if (topLevel) {
        this.logs = [];
        logger.debug('Transaction reverted', error instanceof Error ? error.message : String(error));
      }
      throw error;
    } finally {
      this.frames.pop();
    }
  }

  /** Sender of the innermost active call */
  msgSender(): Address {
    const sender = this.frames[this.frames.length - 1];
    if (sender === undefined) {
      throw new CollectionError(CollectionErrorCode.NO_ACTIVE_CALL, 'Chain#msgSender');
    }
    return sender;
  }

  get inCall(): boolean {
    return this.frames.length > 0;
  }

  emit(address: Address, event: ContractEvent): void {
    ensure(this.frames.length > 0, CollectionErrorCode.NO_ACTIVE_CALL, 'Chain#emit');
    const logs = this.logs;
    const length = logs.length;
    logs.push({ ...event, address });
    this.journal.record(() => {
      logs.length = length;
    });
  }

  // ==========================================================================
  // Accounts
  // ==========================================================================

  nonceOf(address: Address): number {
    return this.nonces.get(address) ?? 0;
  }

  /**
   * Deploy a contract at the CREATE address of `from` and its current nonce
   */
  deploy<C extends Contract>(from: Address, build: (address: Address) => C): Receipt<C> {
    return this.call(from, () => {
      const sender = this.msgSender();
      const nonce = this.nonceOf(sender);
      const address = computeCreateAddress(sender, nonce);
      this.nonces.set(sender, nonce + 1);
      const contract = build(address);
      this.install(contract);
      return contract;
    });
  }

  /**
   * Place a contract at its own (precomputed) address
   * @throws CollectionError CREATION_FAILED when the address is taken
   */
  install(contract: Contract): void {
    ensure(this.frames.length > 0, CollectionErrorCode.NO_ACTIVE_CALL, 'Chain#install');
    ensure(!this.accounts.has(contract.address), CollectionErrorCode.CREATION_FAILED, 'Chain#install');
    this.accounts.set(contract.address, contract);
  }

  getContract(address: Address): Contract | undefined {
    return this.accounts.get(toAddress(address, 'Chain#getContract'));
  }

  isContract(address: Address): boolean {
    return this.accounts.has(toAddress(address, 'Chain#isContract'));
  }

  /**
   * Contract at `address` narrowed by `guard`, or undefined
   */
  contractAt<C extends Contract>(address: Address, guard: (contract: Contract) => contract is C): C | undefined {
    const contract = this.getContract(address);
    return contract !== undefined && guard(contract) ? contract : undefined;
  }
}

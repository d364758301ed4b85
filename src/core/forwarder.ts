/**
 * Forwarder
 *
 * Owns collections on behalf of a policy contract. Its owner, or the one
 * authorized caller, can push typed calls through it to a collection.
 */

import type { Chain } from './chain.js';
import type { Receipt, TxOptions } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import { ZERO_ADDRESS } from '../utils/constants.js';
import { isCollection } from './collection.js';
import { type CollectionCall, dispatchCollectionCall } from './collection-calls.js';
import { type Contract, Ownable } from './contract.js';
import { CallFailedError, CollectionError, CollectionErrorCode, ensure } from './errors.js';

export interface ForwarderParams {
  owner: Address;
  caller: Address;
}

export class Forwarder extends Ownable {
  private readonly callerSlot = this.slot<Address>(ZERO_ADDRESS);

  constructor(chain: Chain, address: Address, params: ForwarderParams) {
    super(chain, address);
    this.setOwner(params.owner);
    this.writeCaller(params.caller);
  }

  caller(): Address {
    return this.callerSlot.get();
  }

  setCaller(newCaller: Address, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setCaller');
      this.writeCaller(newCaller);
    });
  }

  /**
   * Run `call` against the collection at `target` with the forwarder as caller
   * @throws CallFailedError when the call reverts
   */
  forwardCall(target: Address, call: CollectionCall, opts: TxOptions): Receipt<unknown> {
    return this.transact(opts, (sender) => {
      const scope = 'forwardCall';
      ensure(
        sender === this.owner() || sender === this.callerSlot.get(),
        CollectionErrorCode.UNAUTHORIZED_SENDER,
        scope
      );
      try {
        const collection = this.chain.contractAt(target, isCollection);
        if (collection === undefined) {
          throw new CollectionError(CollectionErrorCode.INVALID_COLLECTION, scope);
        }
        return dispatchCollectionCall(collection, call, { from: this.address });
      } catch (error) {
        throw new CallFailedError(scope, error);
      }
    });
  }

  private writeCaller(account: Address): void {
    const newCaller = toAddress(account, 'setCaller');
    const oldCaller = this.callerSlot.get();
    this.callerSlot.set(newCaller);
    this.emit({ event: 'CallerSet', args: { oldCaller, newCaller } });
  }
}

export function isForwarder(contract: Contract): contract is Forwarder {
  return contract instanceof Forwarder;
}

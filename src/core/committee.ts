/**
 * Committee
 *
 * Members vote off-chain; any member can push the decision to the manager.
 */

import type { Chain } from './chain.js';
import type { Receipt, TxOptions } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import type { CollectionCall } from './collection-calls.js';
import { isCollectionManager } from './collection-manager.js';
import { Ownable } from './contract.js';
import { CollectionErrorCode, ensure } from './errors.js';

export interface CommitteeParams {
  owner: Address;
  members: Address[];
}

export class Committee extends Ownable {
  private readonly memberSet = this.map<Address, boolean>();

  constructor(chain: Chain, address: Address, params: CommitteeParams) {
    super(chain, address);
    this.setOwner(params.owner);
    for (const member of params.members) {
      this.writeMember(member, true, 'constructor');
    }
  }

  members(account: Address): boolean {
    return this.memberSet.get(toAddress(account, 'members')) ?? false;
  }

  setMembers(members: Address[], values: boolean[], opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'setMembers';
      this.onlyOwner(sender, scope);
      ensure(members.length === values.length, CollectionErrorCode.LENGTH_MISMATCH, scope);
      members.forEach((member, i) => this.writeMember(member, values[i], scope));
    });
  }

  /**
   * Forward a call to `manager.manageCollection` with the committee as caller
   */
  manageCollection(
    manager: Address,
    forwarder: Address,
    factory: Address,
    collection: Address,
    call: CollectionCall,
    opts: TxOptions
  ): Receipt<unknown> {
    return this.transact(opts, (sender) => {
      const scope = 'manageCollection';
      ensure(this.members(sender), CollectionErrorCode.UNAUTHORIZED_SENDER, scope);
      const collectionManager = this.chain.contractAt(manager, isCollectionManager);
      ensure(collectionManager !== undefined, CollectionErrorCode.INVALID_ADDRESS, scope);
      return collectionManager.manageCollection(forwarder, factory, collection, call, { from: this.address }).value;
    });
  }

  private writeMember(account: Address, value: boolean, scope: string): void {
    const member = toAddress(account, scope);
    ensure(this.members(member) !== value, CollectionErrorCode.VALUE_IS_THE_SAME, scope);
    this.memberSet.set(member, value);
    this.emit({ event: 'MemberSet', args: { member, value } });
  }
}

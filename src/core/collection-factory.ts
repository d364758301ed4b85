/**
 * Factory for collection clones
 */

import type { Chain } from './chain.js';
import type { CollectionInitParams, Receipt, TxOptions } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import { computeCreate2Address, deriveCreationSalt } from './addressing.js';
import { type ERC721CollectionV2, isCollection } from './collection.js';
import type { Contract } from './contract.js';
import { MinimalProxyFactory } from './proxy-factory.js';

export interface CollectionFactoryParams {
  implementation: Address;
  owner: Address;
}

export class ERC721CollectionFactoryV2 extends MinimalProxyFactory<ERC721CollectionV2> {
  constructor(chain: Chain, address: Address, params: CollectionFactoryParams) {
    super(chain, address, params.implementation);
    this.setOwner(params.owner);
  }

  protected resolveImplementation(address: Address): ERC721CollectionV2 | undefined {
    return this.chain.contractAt(address, isCollection);
  }

  /**
   * Deploy a collection at `getAddress(salt, caller)`. With `init`, the clone
   * is initialized by the factory and then handed to the factory owner.
   * `init.proofOfCreation` defaults to `keccak256(salt ‖ caller)`.
   *
   * @throws CollectionError CREATION_FAILED when the address is taken
   * @throws CallFailedError when initialization reverts
   */
  createCollection(salt: Hex, init: CollectionInitParams | undefined, opts: TxOptions): Receipt<ERC721CollectionV2> {
    return this.transact(opts, (sender) => {
      if (init === undefined) {
        return this.createProxy(sender, salt);
      }
      const params: CollectionInitParams = {
        ...init,
        proofOfCreation: init.proofOfCreation ?? deriveCreationSalt(salt, sender),
      };
      const collection = this.createProxy(sender, salt, (proxy) => {
        proxy.initialize(params, { from: this.address });
        proxy.transferOwnership(this.owner(), { from: this.address });
      });
      return collection;
    });
  }

  /**
   * Whether `candidate` is a collection whose proof of creation hashes back
   * to its own address under this factory and proxy code
   */
  isValidCollection(candidate: Address): boolean {
    const collection = this.chain.contractAt(candidate, isCollection);
    if (collection === undefined) {
      return false;
    }
    const expected = computeCreate2Address(this.address, collection.proofOfCreation(), this.codeHash());
    return expected === toAddress(candidate, 'isValidCollection');
  }
}

export function isCollectionFactory(contract: Contract): contract is ERC721CollectionFactoryV2 {
  return contract instanceof ERC721CollectionFactoryV2;
}

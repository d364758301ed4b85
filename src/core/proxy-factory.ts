/**
 * Minimal proxy factory
 *
 * Clones an implementation at CREATE2 addresses derived from the caller's
 * salt and address. Each clone starts with empty storage, like an EIP-1167
 * proxy in front of the implementation.
 */

import type { Chain } from './chain.js';
import { type Address, isZeroAddress, toAddress } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import { logger } from '../utils/logger.js';
import { codeHashOf, computeCreate2Address, deriveCreationSalt, minimalProxyCode } from './addressing.js';
import { type Contract, Ownable } from './contract.js';
import { CallFailedError, CollectionErrorCode, ensure } from './errors.js';

/**
 * Implementation contracts hand out fresh instances of themselves
 */
export interface ProxyImplementation<C extends Contract> {
  cloneAt(address: Address): C;
}

export abstract class MinimalProxyFactory<C extends Contract> extends Ownable {
  private readonly implementationAddress: Address;
  private readonly proxyCode: Hex;
  private readonly proxyCodeHash: Hex;

  constructor(chain: Chain, address: Address, implementationAddress: Address) {
    super(chain, address);
    const scope = '_setImplementation';
    const implementation = toAddress(implementationAddress, scope);
    ensure(
      !isZeroAddress(implementation) && this.resolveImplementation(implementation) !== undefined,
      CollectionErrorCode.INVALID_IMPLEMENTATION,
      scope
    );
    this.implementationAddress = implementation;
    this.proxyCode = minimalProxyCode(implementation);
    this.proxyCodeHash = codeHashOf(this.proxyCode);
  }

  /**
   * Narrow the contract at `address` to an implementation this factory clones
   */
  protected abstract resolveImplementation(address: Address): (C & ProxyImplementation<C>) | undefined;

  implementation(): Address {
    return this.implementationAddress;
  }

  /** EIP-1167 creation code shared by every proxy */
  code(): Hex {
    return this.proxyCode;
  }

  codeHash(): Hex {
    return this.proxyCodeHash;
  }

  /**
   * Address a proxy created by `deployer` with `salt` will have
   */
  getAddress(salt: Hex, deployer: Address): Address {
    return computeCreate2Address(this.address, deriveCreationSalt(salt, deployer), this.proxyCodeHash);
  }

  /**
   * Deploy a clone for `sender` and run `init` on it. Must be called inside
   * one of the subclass's transactions.
   */
  protected createProxy(sender: Address, salt: Hex, init?: (proxy: C) => void): C {
    const scope = 'createProxy';
    const address = this.getAddress(salt, sender);
    ensure(!this.chain.isContract(address), CollectionErrorCode.CREATION_FAILED, scope);

    const implementation = this.resolveImplementation(this.implementationAddress);
    ensure(implementation !== undefined, CollectionErrorCode.INVALID_IMPLEMENTATION, scope);
    const proxy = implementation.cloneAt(address);
    this.chain.install(proxy);
    this.emit({ event: 'ProxyCreated', args: { address, salt } });
    logger.info('Proxy created', `address=${address} deployer=${sender}`);

    if (init) {
      try {
        init(proxy);
      } catch (error) {
        throw new CallFailedError(scope, error);
      }
    }
    return proxy;
  }
}

/**
 * Deterministic address derivation
 *
 * CREATE and CREATE2 addresses plus the EIP-1167 minimal proxy code, so
 * addresses computed here can be checked against deployments on a real chain.
 */

import { concat, encodePacked, getContractAddress, keccak256 } from 'viem';
import { type Address, toAddress } from '../utils/address.js';
import { type Hex, isBytes32 } from '../utils/buffer-utils.js';
import { CollectionError, CollectionErrorCode } from './errors.js';

/** EIP-1167 creation code before and after the 20-byte implementation address */
const MINIMAL_PROXY_PREFIX = '0x3d602d80600a3d3981f3363d3d373d3d3d363d73';
const MINIMAL_PROXY_SUFFIX = '0x5af43d82803e903d91602b57fd5bf3';

function requireBytes32(value: Hex, scope: string): Hex {
  if (!isBytes32(value)) {
    throw new CollectionError(CollectionErrorCode.INVALID_SALT, scope);
  }
  return value;
}

/**
 * Address of a contract deployed with CREATE:
 * `keccak256(rlp([sender, nonce]))[12:]`
 */
export function computeCreateAddress(sender: Address, nonce: number | bigint): Address {
  const scope = 'computeCreateAddress';
  return toAddress(
    getContractAddress({ opcode: 'CREATE', from: toAddress(sender, scope), nonce: BigInt(nonce) }),
    scope
  );
}

/**
 * Address of a contract deployed with CREATE2:
 * `keccak256(0xff ‖ deployer ‖ salt ‖ codeHash)[12:]`
 */
export function computeCreate2Address(deployer: Address, salt: Hex, codeHash: Hex): Address {
  const scope = 'computeCreate2Address';
  return toAddress(
    getContractAddress({
      opcode: 'CREATE2',
      from: toAddress(deployer, scope),
      salt: requireBytes32(salt, scope),
      bytecodeHash: requireBytes32(codeHash, scope),
    }),
    scope
  );
}

/**
 * Salt the factory hands to CREATE2 for a given user salt and caller:
 * `keccak256(salt ‖ deployer)`. Collections store it as their proof of creation.
 */
export function deriveCreationSalt(salt: Hex, deployer: Address): Hex {
  const scope = 'deriveCreationSalt';
  return keccak256(
    encodePacked(['bytes32', 'address'], [requireBytes32(salt, scope), toAddress(deployer, scope)])
  );
}

/**
 * EIP-1167 creation code of a minimal proxy delegating to `implementation`
 */
export function minimalProxyCode(implementation: Address): Hex {
  return concat([MINIMAL_PROXY_PREFIX, toAddress(implementation, 'minimalProxyCode'), MINIMAL_PROXY_SUFFIX]);
}

export function codeHashOf(code: Hex): Hex {
  return keccak256(code);
}

/**
 * 20-byte account addresses in lowercase 0x form
 */

import { isAddress as isEvmAddress } from 'viem';
import { CollectionError, CollectionErrorCode } from '../core/errors.js';
import type { Hex } from './buffer-utils.js';
import { ZERO_ADDRESS } from './constants.js';

export type Address = Hex;

/**
 * Any-case 20-byte hex; checksums are not enforced
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && isEvmAddress(value, { strict: false });
}

/**
 * Normalize an address to lowercase so that map keys and comparisons agree
 * @throws CollectionError INVALID_ADDRESS when the input is not 20 hex bytes
 */
export function toAddress(value: string, scope: string = 'toAddress'): Address {
  if (!isAddress(value)) {
    throw new CollectionError(CollectionErrorCode.INVALID_ADDRESS, scope);
  }
  return `0x${value.slice(2).toLowerCase()}`;
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}

/**
 * Payment token consumed by the collection manager
 *
 * Any ERC20-style balance ledger living on the chain can serve as the
 * accepted token.
 */

import type { Receipt, TxOptions } from '../models/interfaces.js';
import type { Address } from '../utils/address.js';
import type { Contract } from './contract.js';

export interface FungibleToken {
  balanceOf(owner: Address): bigint;
  allowance(owner: Address, spender: Address): bigint;
  /** Move `amount` from `from` to `to` using the caller's allowance */
  transferFrom(from: Address, to: Address, amount: bigint, opts: TxOptions): Receipt<boolean>;
}

export function isFungibleToken(contract: Contract): contract is Contract & FungibleToken {
  return (
    'transferFrom' in contract &&
    typeof contract.transferFrom === 'function' &&
    'allowance' in contract &&
    typeof contract.allowance === 'function' &&
    'balanceOf' in contract &&
    typeof contract.balanceOf === 'function'
  );
}

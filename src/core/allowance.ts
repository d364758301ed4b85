/**
 * Per-item minter allowances
 */

import type { MinterAllowance } from '../models/interfaces.js';
import { UINT256_MAX } from '../utils/constants.js';
import { CollectionErrorCode, ensure } from './errors.js';
import { toBigInt } from './utils.js';

export const UNLIMITED: MinterAllowance = { kind: 'unlimited' };
export const NO_ALLOWANCE: MinterAllowance = { kind: 'finite', remaining: 0n };

export function finite(remaining: bigint | number): MinterAllowance {
  const allowance: MinterAllowance = { kind: 'finite', remaining: toBigInt(remaining, 'remaining') };
  assertValidAllowance(allowance, 'finite');
  return allowance;
}

/**
 * @throws CollectionError INVALID_ALLOWANCE for a finite count outside uint256
 */
export function assertValidAllowance(allowance: MinterAllowance, scope: string): void {
  if (allowance.kind === 'unlimited') {
    return;
  }
  ensure(
    allowance.remaining >= 0n && allowance.remaining <= UINT256_MAX,
    CollectionErrorCode.INVALID_ALLOWANCE,
    scope
  );
}

export function isUsable(allowance: MinterAllowance): boolean {
  return allowance.kind === 'unlimited' || allowance.remaining > 0n;
}

/**
 * Allowance after one issuance. Unlimited allowances never change.
 */
export function consume(allowance: MinterAllowance): MinterAllowance {
  if (allowance.kind === 'unlimited') {
    return allowance;
  }
  ensure(allowance.remaining > 0n, CollectionErrorCode.CALLER_CAN_NOT_MINT, 'consume');
  return { kind: 'finite', remaining: allowance.remaining - 1n };
}

export function sameAllowance(a: MinterAllowance, b: MinterAllowance): boolean {
  if (a.kind === 'unlimited' || b.kind === 'unlimited') {
    return a.kind === b.kind;
  }
  return a.remaining === b.remaining;
}

/**
 * uint256 view of an allowance, with unlimited reported as the max value
 */
export function allowanceToUint256(allowance: MinterAllowance): bigint {
  return allowance.kind === 'unlimited' ? UINT256_MAX : allowance.remaining;
}

/**
 * Read a raw uint256 allowance where the max value means unlimited
 */
export function allowanceFromUint256(value: bigint): MinterAllowance {
  return value === UINT256_MAX ? UNLIMITED : finite(value);
}

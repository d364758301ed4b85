/**
 * Numeric helpers
 */

import { CollectionError, CollectionErrorCode } from './errors.js';

function invalidNumber(fieldName: string | undefined, scope: string, message: string): CollectionError {
  return new CollectionError(CollectionErrorCode.INVALID_NUMERIC_VALUE, fieldName ?? scope, message);
}

/**
 * Convert a bigint-like value to a native BigInt.
 *
 * Item IDs and prices may arrive as numbers or decimal strings from callers;
 * everything inside the ledger is bigint.
 *
 * @param value - A bigint, integer number, or decimal/hex string
 * @param fieldName - Optional field name, used as the error scope
 * @throws CollectionError INVALID_NUMERIC_VALUE
 */
export function toBigInt(value: bigint | number | string, fieldName?: string): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw invalidNumber(
        fieldName,
        'toBigInt',
        `Invalid numeric value for ${fieldName ?? 'unknown'}: ${value} is not a safe integer`
      );
    }
    return BigInt(value);
  }
  try {
    return BigInt(value);
  } catch {
    throw invalidNumber(fieldName, 'toBigInt', `Invalid numeric value for ${fieldName ?? 'unknown'}: cannot convert to BigInt`);
  }
}

/**
 * Convert a uint256 that is known to be small (item index, list position)
 * to a number
 */
export function toSafeNumber(value: bigint, fieldName?: string): number {
  if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw invalidNumber(fieldName, 'toSafeNumber', `Value for ${fieldName ?? 'unknown'} does not fit in a safe integer`);
  }
  return Number(value);
}

/**
 * Token ID codec
 *
 * A token ID packs the item it was issued against and its 1-based issue
 * number into one uint256: itemId in the high 40 bits, issuedId in the low
 * 216 bits. Inputs are range-checked, never truncated.
 */

import type { DecodedTokenId } from '../models/interfaces.js';
import { TOKEN_ID, UINT256_MAX } from '../utils/constants.js';
import { CollectionErrorCode, ensure } from './errors.js';
import { toBigInt } from './utils.js';

const ISSUED_ID_MASK = TOKEN_ID.MAX_ISSUED_ID;

export function encodeTokenId(itemId: bigint | number, issuedId: bigint | number): bigint {
  const item = toBigInt(itemId, 'itemId');
  const issued = toBigInt(issuedId, 'issuedId');
  ensure(item >= 0n && item <= TOKEN_ID.MAX_ITEM_ID, CollectionErrorCode.INVALID_ITEM_ID, 'encodeTokenId');
  ensure(issued >= 0n && issued <= TOKEN_ID.MAX_ISSUED_ID, CollectionErrorCode.INVALID_ISSUED_ID, 'encodeTokenId');
  return (item << TOKEN_ID.ISSUED_ID_BITS) | issued;
}

export function decodeTokenId(tokenId: bigint): DecodedTokenId {
  ensure(tokenId >= 0n && tokenId <= UINT256_MAX, CollectionErrorCode.INVALID_TOKEN_ID, 'decodeTokenId');
  return {
    itemId: tokenId >> TOKEN_ID.ISSUED_ID_BITS,
    issuedId: tokenId & ISSUED_ID_MASK,
  };
}

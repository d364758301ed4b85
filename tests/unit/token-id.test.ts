import { describe, it, expect } from '@jest/globals';
import { decodeTokenId, encodeTokenId } from '../../src/core/token-id.js';
import { CollectionErrorCode } from '../../src/core/errors.js';
import { TOKEN_ID, UINT256_MAX } from '../../src/utils/constants.js';
import { expectRevert } from '../helpers/fixtures.js';

describe('encodeTokenId', () => {
  it('packs the item id into the high 40 bits', () => {
    expect(encodeTokenId(1, 0)).toBe(1n << 216n);
    expect(encodeTokenId(0, 1)).toBe(1n);
    expect(encodeTokenId(1, 1)).toBe((1n << 216n) + 1n);
  });

  it('accepts the largest values of both fields', () => {
    expect(encodeTokenId(TOKEN_ID.MAX_ITEM_ID, TOKEN_ID.MAX_ISSUED_ID)).toBe(UINT256_MAX);
  });

  it('rejects an item id wider than 40 bits', () => {
    expectRevert(() => encodeTokenId(TOKEN_ID.MAX_ITEM_ID + 1n, 0), CollectionErrorCode.INVALID_ITEM_ID);
  });

  it('rejects an issued id wider than 216 bits', () => {
    expectRevert(() => encodeTokenId(0, TOKEN_ID.MAX_ISSUED_ID + 1n), CollectionErrorCode.INVALID_ISSUED_ID);
  });

  it('rejects negative inputs', () => {
    expectRevert(() => encodeTokenId(-1n, 0), CollectionErrorCode.INVALID_ITEM_ID);
    expectRevert(() => encodeTokenId(0, -1), CollectionErrorCode.INVALID_ISSUED_ID);
  });

  it('reports the codec as the failing scope', () => {
    const error = expectRevert(() => encodeTokenId(1n << 40n, 1), CollectionErrorCode.INVALID_ITEM_ID);
    expect(error.scope).toBe('encodeTokenId');
    expect(error.message).toBe('encodeTokenId: INVALID_ITEM_ID');
  });
});

describe('decodeTokenId', () => {
  it('inverts encodeTokenId', () => {
    const pairs: Array<[bigint, bigint]> = [
      [0n, 0n],
      [3n, 42n],
      [TOKEN_ID.MAX_ITEM_ID, 1n],
      [7n, TOKEN_ID.MAX_ISSUED_ID],
    ];
    for (const [itemId, issuedId] of pairs) {
      expect(decodeTokenId(encodeTokenId(itemId, issuedId))).toEqual({ itemId, issuedId });
    }
  });

  it('splits the max uint256 into both max fields', () => {
    expect(decodeTokenId(UINT256_MAX)).toEqual({
      itemId: TOKEN_ID.MAX_ITEM_ID,
      issuedId: TOKEN_ID.MAX_ISSUED_ID,
    });
  });

  it('rejects values outside uint256', () => {
    expectRevert(() => decodeTokenId(UINT256_MAX + 1n), CollectionErrorCode.INVALID_TOKEN_ID);
    expectRevert(() => decodeTokenId(-1n), CollectionErrorCode.INVALID_TOKEN_ID);
  });
});

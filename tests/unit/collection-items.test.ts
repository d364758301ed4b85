import { describe, it, expect, beforeEach } from '@jest/globals';
import { CollectionErrorCode } from '../../src/core/errors.js';
import type { ItemInput } from '../../src/models/interfaces.js';
import { EMPTY_HASH, ZERO_ADDRESS } from '../../src/utils/constants.js';
import { ITEMS, accounts, expectRevert, setupCollection, type CollectionSetup } from '../helpers/fixtures.js';

const CONTENT_HASH = '0x1111111111111111111111111111111111111111111111111111111111111111';

const newItem: ItemInput = {
  rarity: 'legendary',
  price: 10n,
  beneficiary: accounts.beneficiary,
  metadata: '1:bracelet:hands:BaseMale',
};

describe('ERC721CollectionV2 item catalogue', () => {
  let setup: CollectionSetup;
  const owner = { from: accounts.factoryOwner };
  const creator = { from: accounts.creator };

  beforeEach(() => {
    setup = setupCollection();
  });

  describe('addItems', () => {
    it('appends items with sequential ids', () => {
      const receipt = setup.collection.addItems([newItem, { ...newItem, rarity: 'epic' }], creator);
      expect(receipt.value).toEqual([3n, 4n]);
      expect(setup.collection.itemsCount()).toBe(5n);
      expect(setup.collection.items(4).maxSupply).toBe(1_000n);
      expect(receipt.logs.map((log) => log.event)).toEqual(['AddItem', 'AddItem']);
    });

    it('is restricted to the creator', () => {
      expectRevert(() => setup.collection.addItems([newItem], owner), CollectionErrorCode.CALLER_IS_NOT_CREATOR);
    });

    it('is closed once the collection is completed', () => {
      setup.collection.completeCollection(creator);
      expectRevert(() => setup.collection.addItems([newItem], creator), CollectionErrorCode.COLLECTION_COMPLETED);
    });

    it('adds nothing when one item of the batch is invalid', () => {
      expectRevert(
        () => setup.collection.addItems([newItem, { ...newItem, rarity: 'exotic_rare' }], creator),
        CollectionErrorCode.INVALID_RARITY
      );
      expect(setup.collection.itemsCount()).toBe(3n);
    });

    it.each<[string, Partial<ItemInput>, CollectionErrorCode]>([
      ['unknown rarity', { rarity: 'exotic_rare' }, CollectionErrorCode.INVALID_RARITY],
      ['non-zero total supply', { totalSupply: 1n }, CollectionErrorCode.INVALID_TOTAL_SUPPLY],
      ['negative price', { price: -1n }, CollectionErrorCode.INVALID_PRICE],
      ['free item with beneficiary', { price: 0n }, CollectionErrorCode.INVALID_PRICE_AND_BENEFICIARY],
      ['paid item without beneficiary', { beneficiary: ZERO_ADDRESS }, CollectionErrorCode.INVALID_PRICE_AND_BENEFICIARY],
      ['empty metadata', { metadata: '' }, CollectionErrorCode.EMPTY_METADATA],
      ['preset content hash', { contentHash: CONTENT_HASH }, CollectionErrorCode.CONTENT_HASH_SHOULD_BE_EMPTY],
    ])('rejects %s', (_label, override, code) => {
      expectRevert(() => setup.collection.addItems([{ ...newItem, ...override }], creator), code);
    });

    it('accepts an explicit zero supply and empty content hash', () => {
      const { value } = setup.collection.addItems([{ ...newItem, totalSupply: 0n, contentHash: EMPTY_HASH }], creator);
      expect(value).toEqual([3n]);
    });

    it('checks rarity before metadata', () => {
      expectRevert(
        () => setup.collection.addItems([{ ...newItem, rarity: 'nope', metadata: '' }], creator),
        CollectionErrorCode.INVALID_RARITY
      );
    });
  });

  describe('editItemsSalesData', () => {
    it('updates price and beneficiary', () => {
      const { logs } = setup.collection.editItemsSalesData([0], [5n], [accounts.anotherHolder], creator);
      const item = setup.collection.items(0);
      expect(item.price).toBe(5n);
      expect(item.beneficiary).toBe(accounts.anotherHolder);
      expect(logs[0]).toEqual({
        event: 'UpdateItemSalesData',
        args: { itemId: 0n, price: 5n, beneficiary: accounts.anotherHolder },
        address: setup.collection.address,
      });
    });

    it('can make a paid item free', () => {
      setup.collection.editItemsSalesData([0], [0n], [ZERO_ADDRESS], creator);
      expect(setup.collection.items(0).price).toBe(0n);
    });

    it('stays open after completion', () => {
      setup.collection.completeCollection(creator);
      setup.collection.editItemsSalesData([2], [7n], [accounts.beneficiary], creator);
      expect(setup.collection.items(2).price).toBe(7n);
    });

    it('lets item managers edit only their items', () => {
      setup.collection.setItemsManagers([1], [accounts.manager], [true], creator);
      setup.collection.editItemsSalesData([1], [1n], [accounts.manager], { from: accounts.manager });
      expect(setup.collection.items(1).price).toBe(1n);
      expectRevert(
        () => setup.collection.editItemsSalesData([0], [1n], [accounts.manager], { from: accounts.manager }),
        CollectionErrorCode.CALLER_IS_NOT_CREATOR_OR_MANAGER
      );
    });

    it('lets global managers edit any item', () => {
      setup.collection.setManagers([accounts.manager], [true], creator);
      setup.collection.editItemsSalesData([0, 2], [1n, 2n], [accounts.manager, accounts.manager], {
        from: accounts.manager,
      });
      expect(setup.collection.items(2).price).toBe(2n);
    });

    it('rejects unknown items and mismatched arrays', () => {
      expectRevert(
        () => setup.collection.editItemsSalesData([9], [1n], [accounts.beneficiary], creator),
        CollectionErrorCode.ITEM_DOES_NOT_EXIST
      );
      expectRevert(
        () => setup.collection.editItemsSalesData([0, 1], [1n], [accounts.beneficiary], creator),
        CollectionErrorCode.LENGTH_MISMATCH
      );
    });

    it('enforces the price and beneficiary pairing', () => {
      expectRevert(
        () => setup.collection.editItemsSalesData([0], [1n], [ZERO_ADDRESS], creator),
        CollectionErrorCode.INVALID_PRICE_AND_BENEFICIARY
      );
    });
  });

  describe('editItemsMetadata', () => {
    it('updates metadata while editable', () => {
      const { logs } = setup.collection.editItemsMetadata([0], ['1:hoodie:upper_body:BaseMale'], creator);
      expect(setup.collection.items(0).metadata).toBe('1:hoodie:upper_body:BaseMale');
      expect(logs[0].event).toBe('UpdateItemMetadata');
    });

    it('is blocked once the collection is locked', () => {
      setup.collection.setEditable(false, owner);
      expectRevert(
        () => setup.collection.editItemsMetadata([0], ['x'], creator),
        CollectionErrorCode.NOT_EDITABLE
      );
    });

    it('rejects empty metadata and strangers', () => {
      expectRevert(() => setup.collection.editItemsMetadata([0], [''], creator), CollectionErrorCode.EMPTY_METADATA);
      expectRevert(
        () => setup.collection.editItemsMetadata([0], ['x'], { from: accounts.hacker }),
        CollectionErrorCode.CALLER_IS_NOT_CREATOR_OR_MANAGER
      );
    });

    it('leaves every item untouched when one edit fails', () => {
      expectRevert(
        () => setup.collection.editItemsMetadata([0, 1], ['changed', ''], creator),
        CollectionErrorCode.EMPTY_METADATA
      );
      expect(setup.collection.items(0).metadata).toBe(ITEMS[0].metadata);
    });
  });

  describe('rescueItems', () => {
    it('sets the content hash and metadata', () => {
      const { logs } = setup.collection.rescueItems([1], [CONTENT_HASH], ['1:tiara_v2:hat:BaseFemale'], owner);
      const item = setup.collection.items(1);
      expect(item.contentHash).toBe(CONTENT_HASH);
      expect(item.metadata).toBe('1:tiara_v2:hat:BaseFemale');
      expect(logs[0]).toEqual({
        event: 'RescueItem',
        args: { itemId: 1n, contentHash: CONTENT_HASH, metadata: '1:tiara_v2:hat:BaseFemale' },
        address: setup.collection.address,
      });
    });

    it('keeps the metadata when none is given', () => {
      setup.collection.rescueItems([1], [CONTENT_HASH], [''], owner);
      expect(setup.collection.items(1).metadata).toBe(ITEMS[1].metadata);
    });

    it('works on locked and completed collections', () => {
      setup.collection.setEditable(false, owner);
      setup.collection.completeCollection(creator);
      setup.collection.rescueItems([0], [CONTENT_HASH], [''], owner);
      expect(setup.collection.items(0).contentHash).toBe(CONTENT_HASH);
    });

    it('is restricted to the owner', () => {
      expectRevert(
        () => setup.collection.rescueItems([0], [CONTENT_HASH], [''], creator),
        CollectionErrorCode.CALLER_IS_NOT_OWNER
      );
    });

    it('validates items, hashes and array lengths', () => {
      expectRevert(
        () => setup.collection.rescueItems([5], [CONTENT_HASH], [''], owner),
        CollectionErrorCode.ITEM_DOES_NOT_EXIST
      );
      expectRevert(
        () => setup.collection.rescueItems([0], ['0xabcd'], [''], owner),
        CollectionErrorCode.INVALID_CONTENT_HASH
      );
      expectRevert(
        () => setup.collection.rescueItems([0], [CONTENT_HASH], [], owner),
        CollectionErrorCode.LENGTH_MISMATCH
      );
    });
  });

  it('reports unknown items', () => {
    expectRevert(() => setup.collection.items(3), CollectionErrorCode.ITEM_DOES_NOT_EXIST);
  });
});

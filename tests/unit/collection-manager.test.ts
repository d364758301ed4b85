import { describe, it, expect, beforeEach } from '@jest/globals';
import { deriveCreationSalt } from '../../src/core/addressing.js';
import type { Chain } from '../../src/core/chain.js';
import type { ERC721CollectionV2 } from '../../src/core/collection.js';
import type { CollectionCall } from '../../src/core/collection-calls.js';
import type { ERC721CollectionFactoryV2 } from '../../src/core/collection-factory.js';
import { CollectionManager, type ManagedCollectionParams } from '../../src/core/collection-manager.js';
import { Committee } from '../../src/core/committee.js';
import { CollectionErrorCode } from '../../src/core/errors.js';
import { Forwarder } from '../../src/core/forwarder.js';
import type { Address } from '../../src/utils/address.js';
import { GRACE_PERIOD, ZERO_ADDRESS } from '../../src/utils/constants.js';
import {
  BASE_URI,
  ITEMS,
  accounts,
  deployFactory,
  expectCallFailed,
  expectRevert,
  initParams,
  newChain,
  salt,
  shouted,
} from '../helpers/fixtures.js';
import { TestToken } from '../helpers/test-token.js';

const PRICE_PER_ITEM = 10n;

describe('collection manager', () => {
  let chain: Chain;
  let token: TestToken;
  let committee: Committee;
  let manager: CollectionManager;
  let forwarder: Forwarder;
  let factory: ERC721CollectionFactoryV2;

  const admin = { from: accounts.deployer };
  const user = { from: accounts.user };
  const member = { from: accounts.user };
  const approve: CollectionCall = { method: 'setApproved', args: { value: true } };

  function params(overrides: Partial<ManagedCollectionParams> = {}): ManagedCollectionParams {
    return {
      forwarder: forwarder.address,
      factory: factory.address,
      salt: salt(1),
      name: 'Managed Collection',
      symbol: 'MCOL',
      baseURI: BASE_URI,
      creator: accounts.creator,
      items: ITEMS,
      ...overrides,
    };
  }

  function createManaged(overrides: Partial<ManagedCollectionParams> = {}): ERC721CollectionV2 {
    return manager.createCollection(params(overrides), user).value;
  }

  beforeEach(() => {
    chain = newChain();
    token = chain.deploy(accounts.deployer, (address) => new TestToken(chain, address)).value;
    committee = chain.deploy(
      accounts.deployer,
      (address) => new Committee(chain, address, { owner: accounts.deployer, members: [accounts.user] })
    ).value;
    manager = chain.deploy(
      accounts.deployer,
      (address) =>
        new CollectionManager(chain, address, {
          owner: accounts.deployer,
          acceptedToken: token.address,
          committee: committee.address,
          feesCollector: accounts.beneficiary,
          pricePerItem: PRICE_PER_ITEM,
        })
    ).value;
    forwarder = chain.deploy(
      accounts.deployer,
      (address) => new Forwarder(chain, address, { owner: accounts.deployer, caller: manager.address })
    ).value;
    ({ factory } = deployFactory(chain, forwarder.address));

    token.mint(accounts.user, 1_000n, admin);
    token.approve(manager.address, 1_000n, user);
  });

  describe('createCollection', () => {
    it('creates a completed collection awaiting approval', () => {
      const collection = createManaged();
      expect(collection.isCompleted()).toBe(true);
      expect(collection.isApproved()).toBe(false);
      expect(collection.owner()).toBe(forwarder.address);
      expect(collection.creator()).toBe(accounts.creator);
      expect(collection.name()).toBe('Managed Collection');
      expect(collection.itemsCount()).toBe(3n);
    });

    it('charges the price of every item to the caller', () => {
      createManaged();
      expect(token.balanceOf(accounts.user)).toBe(970n);
      expect(token.balanceOf(accounts.beneficiary)).toBe(30n);
    });

    it('derives the address from the caller salt', () => {
      const creationSalt = deriveCreationSalt(salt(1), accounts.user);
      const collection = createManaged();
      expect(collection.address).toBe(factory.getAddress(creationSalt, manager.address));
      expect(collection.proofOfCreation()).toBe(deriveCreationSalt(creationSalt, manager.address));
      expect(factory.isValidCollection(collection.address)).toBe(true);
    });

    it('fails without a token allowance and creates nothing', () => {
      token.approve(manager.address, 0n, user);
      const error = expectCallFailed(() => createManaged());
      expect(error.cause).toBeInstanceOf(Error);
      const address = factory.getAddress(deriveCreationSalt(salt(1), accounts.user), manager.address);
      expect(chain.isContract(address)).toBe(false);
      expect(token.balanceOf(accounts.user)).toBe(1_000n);
    });

    it('fails when the token reports an unsuccessful transfer', () => {
      token.setFailTransfers(true, admin);
      expectCallFailed(() => createManaged());
    });

    it('skips the charge for free collections', () => {
      manager.setPricePerItem(0n, admin);
      token.approve(manager.address, 0n, user);
      createManaged();
      expect(token.balanceOf(accounts.user)).toBe(1_000n);
    });

    it('charges nothing when there are no items', () => {
      const collection = createManaged({ items: [] });
      expect(collection.itemsCount()).toBe(0n);
      expect(token.balanceOf(accounts.user)).toBe(1_000n);
    });

    it('rejects unknown factories and forwarders', () => {
      expectRevert(() => createManaged({ factory: token.address }), CollectionErrorCode.INVALID_ADDRESS);
      expectRevert(() => createManaged({ forwarder: accounts.hacker }), CollectionErrorCode.INVALID_ADDRESS);
    });

    it('fails when the forwarder does not own the factory output', () => {
      const { factory: foreignFactory } = deployFactory(chain, accounts.deployer);
      expectCallFailed(() => createManaged({ factory: foreignFactory.address }), CollectionErrorCode.CALLER_IS_NOT_OWNER);
    });

    it('rejects an invalid item', () => {
      expectCallFailed(
        () => createManaged({ items: [{ ...ITEMS[0], metadata: '' }] }),
        CollectionErrorCode.EMPTY_METADATA
      );
    });
  });

  describe('manageCollection', () => {
    let collection: ERC721CollectionV2;

    beforeEach(() => {
      collection = createManaged();
    });

    it('lets a committee member approve a collection', () => {
      committee.manageCollection(manager.address, forwarder.address, factory.address, collection.address, approve, member);
      expect(collection.isApproved()).toBe(true);

      chain.increaseTime(GRACE_PERIOD);
      const tokenId = collection.issueToken(accounts.holder, 0, { from: accounts.creator }).value;
      expect(collection.ownerOf(tokenId)).toBe(accounts.holder);
    });

    it('accepts an account as committee', () => {
      manager.setCommittee(accounts.user, admin);
      manager.manageCollection(forwarder.address, factory.address, collection.address, approve, user);
      expect(collection.isApproved()).toBe(true);
    });

    it('returns the forwarded call result', () => {
      const call: CollectionCall = { method: 'setEditable', args: { value: false } };
      const { value } = committee.manageCollection(
        manager.address,
        forwarder.address,
        factory.address,
        collection.address,
        call,
        member
      );
      expect(value).toBeUndefined();
      expect(collection.isEditable()).toBe(false);
    });

    it('rejects callers other than the committee', () => {
      expectRevert(
        () => manager.manageCollection(forwarder.address, factory.address, collection.address, approve, { from: accounts.hacker }),
        CollectionErrorCode.UNAUTHORIZED_SENDER
      );
      expectRevert(
        () =>
          committee.manageCollection(manager.address, forwarder.address, factory.address, collection.address, approve, {
            from: accounts.hacker,
          }),
        CollectionErrorCode.UNAUTHORIZED_SENDER
      );
    });

    it('rejects targets that are not collections of the factory', () => {
      const manage = (target: Address) => () =>
        committee.manageCollection(manager.address, forwarder.address, factory.address, target, approve, member);
      expectRevert(manage(token.address), CollectionErrorCode.INVALID_COLLECTION);
      expectRevert(manage(accounts.hacker), CollectionErrorCode.INVALID_COLLECTION);

      const { factory: otherFactory } = deployFactory(chain, forwarder.address);
      const foreign = otherFactory.createCollection(salt(5), initParams(), { from: accounts.hacker }).value;
      expectRevert(manage(foreign.address), CollectionErrorCode.INVALID_COLLECTION);
      expectRevert(
        () =>
          committee.manageCollection(manager.address, forwarder.address, token.address, collection.address, approve, member),
        CollectionErrorCode.INVALID_COLLECTION
      );
    });

    it('wraps a revert of the managed call', () => {
      const reject: CollectionCall = { method: 'setApproved', args: { value: false } };
      expectCallFailed(
        () => committee.manageCollection(manager.address, forwarder.address, factory.address, collection.address, reject, member),
        CollectionErrorCode.VALUE_IS_THE_SAME
      );
    });
  });

  describe('settings', () => {
    it('updates the fee settings and emits the change', () => {
      const { logs } = manager.setPricePerItem(20n, admin);
      expect(manager.pricePerItem()).toBe(20n);
      expect(logs[0]).toEqual({
        event: 'PricePerItemSet',
        args: { oldPricePerItem: 10n, newPricePerItem: 20n },
        address: manager.address,
      });
      manager.setFeesCollector(accounts.operator, admin);
      expect(manager.feesCollector()).toBe(accounts.operator);
      manager.setAcceptedToken(accounts.operator, admin);
      expect(manager.acceptedToken()).toBe(accounts.operator);
    });

    it('rejects a token without a transfer hook once set', () => {
      manager.setAcceptedToken(accounts.operator, admin);
      expectRevert(() => createManaged(), CollectionErrorCode.INVALID_ACCEPTED_TOKEN);
    });

    it('rejects zero addresses', () => {
      expectRevert(() => manager.setAcceptedToken(ZERO_ADDRESS, admin), CollectionErrorCode.INVALID_ACCEPTED_TOKEN);
      expectRevert(() => manager.setCommittee(ZERO_ADDRESS, admin), CollectionErrorCode.INVALID_COMMITTEE);
      expectRevert(() => manager.setFeesCollector(ZERO_ADDRESS, admin), CollectionErrorCode.INVALID_FEES_COLLECTOR);
    });

    it('stores mixed-case settings in lowercase', () => {
      const { logs } = manager.setFeesCollector(shouted(accounts.operator), admin);
      expect(manager.feesCollector()).toBe(accounts.operator);
      expect(logs[0].args).toEqual({ oldFeesCollector: accounts.beneficiary, newFeesCollector: accounts.operator });
      manager.setCommittee(shouted(accounts.operator), admin);
      expect(manager.committee()).toBe(accounts.operator);
      expectRevert(() => manager.setAcceptedToken('0x1234', admin), CollectionErrorCode.INVALID_ADDRESS);
    });

    it('is restricted to the owner', () => {
      expectRevert(() => manager.setPricePerItem(1n, user), CollectionErrorCode.CALLER_IS_NOT_OWNER);
      expectRevert(() => manager.setCommittee(accounts.user, user), CollectionErrorCode.CALLER_IS_NOT_OWNER);
    });
  });

  describe('Forwarder', () => {
    it('lets its owner call collections directly', () => {
      const collection = createManaged();
      forwarder.forwardCall(collection.address, approve, admin);
      expect(collection.isApproved()).toBe(true);
    });

    it('rejects other senders', () => {
      const collection = createManaged();
      expectRevert(
        () => forwarder.forwardCall(collection.address, approve, { from: accounts.hacker }),
        CollectionErrorCode.UNAUTHORIZED_SENDER
      );
    });

    it('wraps calls to non-collections', () => {
      expectCallFailed(() => forwarder.forwardCall(token.address, approve, admin), CollectionErrorCode.INVALID_COLLECTION);
    });

    it('moves the caller role', () => {
      const { logs } = forwarder.setCaller(accounts.operator, admin);
      expect(forwarder.caller()).toBe(accounts.operator);
      expect(logs[0].args).toEqual({ oldCaller: manager.address, newCaller: accounts.operator });
      expectRevert(() => createManaged(), CollectionErrorCode.UNAUTHORIZED_SENDER);
      expectRevert(() => forwarder.setCaller(accounts.hacker, { from: accounts.hacker }), CollectionErrorCode.CALLER_IS_NOT_OWNER);
    });

    it('matches a caller set in upper case', () => {
      const collection = createManaged();
      forwarder.setCaller(shouted(accounts.operator), admin);
      expect(forwarder.caller()).toBe(accounts.operator);
      forwarder.forwardCall(collection.address, approve, { from: accounts.operator });
      expect(collection.isApproved()).toBe(true);
    });
  });

  describe('Committee', () => {
    it('adds and removes members', () => {
      const { logs } = committee.setMembers([accounts.operator, accounts.user], [true, false], admin);
      expect(committee.members(accounts.operator)).toBe(true);
      expect(committee.members(accounts.user)).toBe(false);
      expect(logs.map((log) => log.args)).toEqual([
        { member: accounts.operator, value: true },
        { member: accounts.user, value: false },
      ]);

      const collection = createManaged();
      expectRevert(
        () =>
          committee.manageCollection(manager.address, forwarder.address, factory.address, collection.address, approve, member),
        CollectionErrorCode.UNAUTHORIZED_SENDER
      );
      committee.manageCollection(manager.address, forwarder.address, factory.address, collection.address, approve, {
        from: accounts.operator,
      });
      expect(collection.isApproved()).toBe(true);
    });

    it('normalizes member addresses', () => {
      committee.setMembers([shouted(accounts.operator)], [true], admin);
      expect(committee.members(accounts.operator)).toBe(true);
      expect(committee.members(shouted(accounts.operator))).toBe(true);
      expectRevert(() => committee.setMembers([shouted(accounts.user)], [true], admin), CollectionErrorCode.VALUE_IS_THE_SAME);
    });

    it('validates membership updates', () => {
      expectRevert(() => committee.setMembers([accounts.user], [true], admin), CollectionErrorCode.VALUE_IS_THE_SAME);
      expectRevert(() => committee.setMembers([accounts.user], [], admin), CollectionErrorCode.LENGTH_MISMATCH);
      expectRevert(() => committee.setMembers([accounts.operator], [true], user), CollectionErrorCode.CALLER_IS_NOT_OWNER);
    });

    it('rejects an unknown manager', () => {
      const collection = createManaged();
      expectRevert(
        () => committee.manageCollection(token.address, forwarder.address, factory.address, collection.address, approve, member),
        CollectionErrorCode.INVALID_ADDRESS
      );
    });

    it('rejects duplicate initial members', () => {
      expectRevert(
        () =>
          chain.deploy(
            accounts.deployer,
            (address) => new Committee(chain, address, { owner: accounts.deployer, members: [accounts.user, accounts.user] })
          ),
        CollectionErrorCode.VALUE_IS_THE_SAME
      );
    });
  });
});

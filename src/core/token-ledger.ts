/**
 * Non-fungible token ledger with enumeration
 *
 * Unique token ID -> owner, per-owner balances, single-token approvals and
 * operator approvals, plus index structures so that every mint and transfer
 * is O(1) regardless of supply.
 */

import type { Receipt, TxOptions } from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import { ERC721_RECEIVED, ZERO_ADDRESS } from '../utils/constants.js';
import { Contract, Ownable } from './contract.js';
import { CollectionError, CollectionErrorCode, ensure } from './errors.js';
import { toBigInt } from './utils.js';

/**
 * Contracts that accept safe transfers
 */
export interface TokenReceiver {
  onERC721Received(operator: Address, from: Address, tokenId: bigint, data: Hex): Hex;
}

export function isTokenReceiver(contract: Contract): contract is Contract & TokenReceiver {
  return 'onERC721Received' in contract && typeof contract.onERC721Received === 'function';
}

function pairKey(a: Address, b: Address | bigint): string {
  return `${a}:${b}`;
}

export abstract class NonFungibleLedger extends Ownable {
  private readonly nameSlot = this.slot('');
  private readonly symbolSlot = this.slot('');
  private readonly owners = this.map<bigint, Address>();
  private readonly balances = this.map<Address, bigint>();
  private readonly tokenApprovals = this.map<bigint, Address>();
  private readonly operatorApprovals = this.map<string, boolean>();
  private readonly allTokens = this.list<bigint>();
  private readonly ownedTokens = this.map<string, bigint>();
  private readonly ownedTokensIndex = this.map<bigint, bigint>();

  // ==========================================================================
  // Metadata
  // ==========================================================================

  name(): string {
    return this.nameSlot.get();
  }

  symbol(): string {
    return this.symbolSlot.get();
  }

  protected setNameAndSymbol(name: string, symbol: string): void {
    this.nameSlot.set(name);
    this.symbolSlot.set(symbol);
  }

  // ==========================================================================
  // Ownership and enumeration
  // ==========================================================================

  balanceOf(account: Address): bigint {
    const owner = toAddress(account, 'balanceOf');
    ensure(owner !== ZERO_ADDRESS, CollectionErrorCode.BALANCE_QUERY_FOR_ZERO_ADDRESS, 'balanceOf');
    return this.balances.get(owner) ?? 0n;
  }

  ownerOf(tokenId: bigint): Address {
    const owner = this.owners.get(tokenId);
    ensure(owner !== undefined, CollectionErrorCode.NONEXISTENT_TOKEN, 'ownerOf');
    return owner;
  }

  exists(tokenId: bigint): boolean {
    return this.owners.has(tokenId);
  }

  /** Number of tokens in circulation */
  totalSupply(): bigint {
    return BigInt(this.allTokens.length);
  }

  tokenByIndex(index: bigint | number): bigint {
    const tokenId = this.allTokens.at(Number(toBigInt(index, 'index')));
    ensure(tokenId !== undefined, CollectionErrorCode.INDEX_OUT_OF_BOUNDS, 'tokenByIndex');
    return tokenId;
  }

  tokenOfOwnerByIndex(owner: Address, index: bigint | number): bigint {
    const tokenId = this.ownedTokens.get(pairKey(toAddress(owner, 'tokenOfOwnerByIndex'), toBigInt(index, 'index')));
    ensure(tokenId !== undefined, CollectionErrorCode.INDEX_OUT_OF_BOUNDS, 'tokenOfOwnerByIndex');
    return tokenId;
  }

  tokensOfOwner(owner: Address): bigint[] {
    const tokens: bigint[] = [];
    const balance = this.balanceOf(owner);
    for (let i = 0n; i < balance; i++) {
      tokens.push(this.tokenOfOwnerByIndex(owner, i));
    }
    return tokens;
  }

  // ==========================================================================
  // Approvals
  // ==========================================================================

  getApproved(tokenId: bigint): Address {
    ensure(this.exists(tokenId), CollectionErrorCode.NONEXISTENT_TOKEN, 'getApproved');
    return this.tokenApprovals.get(tokenId) ?? ZERO_ADDRESS;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    const key = pairKey(toAddress(owner, 'isApprovedForAll'), toAddress(operator, 'isApprovedForAll'));
    return this.operatorApprovals.get(key) ?? false;
  }

  approve(approved: Address, tokenId: bigint, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const to = toAddress(approved, 'approve');
      const owner = this.ownerOf(tokenId);
      ensure(to !== owner, CollectionErrorCode.APPROVAL_TO_CURRENT_OWNER, 'approve');
      ensure(
        sender === owner || this.isApprovedForAll(owner, sender),
        CollectionErrorCode.APPROVE_CALLER_NOT_OWNER_NOR_APPROVED_FOR_ALL,
        'approve'
      );
      this.tokenApprovals.set(tokenId, to);
      this.emit({ event: 'Approval', args: { owner, approved: to, tokenId } });
    });
  }

  setApprovalForAll(account: Address, approved: boolean, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const operator = toAddress(account, 'setApprovalForAll');
      ensure(operator !== sender, CollectionErrorCode.APPROVE_TO_CALLER, 'setApprovalForAll');
      this.operatorApprovals.set(pairKey(sender, operator), approved);
      this.emit({ event: 'ApprovalForAll', args: { owner: sender, operator, approved } });
    });
  }

  // ==========================================================================
  // Transfers
  // ==========================================================================

  transferFrom(from: Address, to: Address, tokenId: bigint, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.transferAs(sender, from, to, tokenId, 'transferFrom');
    });
  }

  safeTransferFrom(from: Address, to: Address, tokenId: bigint, opts: TxOptions, data: Hex = '0x'): Receipt<void> {
    return this.transact(opts, (sender) => {
      const [source, target] = this.transferAs(sender, from, to, tokenId, 'safeTransferFrom');
      this.checkOnReceived(sender, source, target, tokenId, data, 'safeTransferFrom');
    });
  }

  batchTransferFrom(from: Address, to: Address, tokenIds: bigint[], opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      for (const tokenId of tokenIds) {
        this.transferAs(sender, from, to, tokenId, 'batchTransferFrom');
      }
    });
  }

  safeBatchTransferFrom(
    from: Address,
    to: Address,
    tokenIds: bigint[],
    opts: TxOptions,
    data: Hex = '0x'
  ): Receipt<void> {
    return this.transact(opts, (sender) => {
      for (const tokenId of tokenIds) {
        const [source, target] = this.transferAs(sender, from, to, tokenId, 'safeBatchTransferFrom');
        this.checkOnReceived(sender, source, target, tokenId, data, 'safeBatchTransferFrom');
      }
    });
  }

  isApprovedOrOwner(spender: Address, tokenId: bigint): boolean {
    const owner = this.ownerOf(tokenId);
    const account = toAddress(spender, 'isApprovedOrOwner');
    return account === owner || this.getApproved(tokenId) === account || this.isApprovedForAll(owner, account);
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  protected mintToken(beneficiary: Address, tokenId: bigint, scope: string): void {
    const to = toAddress(beneficiary, scope);
    ensure(to !== ZERO_ADDRESS, CollectionErrorCode.MINT_TO_ZERO_ADDRESS, scope);
    ensure(!this.exists(tokenId), CollectionErrorCode.TOKEN_ALREADY_MINTED, scope);

    this.allTokens.push(tokenId);
    this.addToOwner(to, tokenId);
    this.owners.set(tokenId, to);
    this.emit({ event: 'Transfer', args: { from: ZERO_ADDRESS, to, tokenId } });
  }

  /**
   * Move `tokenId` and return the normalized `[from, to]` pair
   */
  private transferAs(
    sender: Address,
    source: Address,
    target: Address,
    tokenId: bigint,
    scope: string
  ): [Address, Address] {
    const from = toAddress(source, scope);
    const to = toAddress(target, scope);
    ensure(
      this.exists(tokenId) && this.isApprovedOrOwner(sender, tokenId),
      CollectionErrorCode.TRANSFER_CALLER_NOT_OWNER_NOR_APPROVED,
      scope
    );
    const owner = this.ownerOf(tokenId);
    ensure(owner === from, CollectionErrorCode.TRANSFER_FROM_INCORRECT_OWNER, scope);
    ensure(to !== ZERO_ADDRESS, CollectionErrorCode.TRANSFER_TO_ZERO_ADDRESS, scope);

    this.tokenApprovals.delete(tokenId);
    this.emit({ event: 'Approval', args: { owner, approved: ZERO_ADDRESS, tokenId } });

    this.removeFromOwner(from, tokenId);
    this.addToOwner(to, tokenId);
    this.owners.set(tokenId, to);
    this.emit({ event: 'Transfer', args: { from, to, tokenId } });
    return [from, to];
  }

  private addToOwner(owner: Address, tokenId: bigint): void {
    const balance = this.balances.get(owner) ?? 0n;
    this.ownedTokens.set(pairKey(owner, balance), tokenId);
    this.ownedTokensIndex.set(tokenId, balance);
    this.balances.set(owner, balance + 1n);
  }

  /**
   * Swap-and-pop removal from the owner's enumeration
   */
  private removeFromOwner(owner: Address, tokenId: bigint): void {
    const lastIndex = (this.balances.get(owner) ?? 0n) - 1n;
    const index = this.ownedTokensIndex.get(tokenId) ?? lastIndex;
    if (index !== lastIndex) {
      const lastTokenId = this.ownedTokens.get(pairKey(owner, lastIndex));
      if (lastTokenId !== undefined) {
        this.ownedTokens.set(pairKey(owner, index), lastTokenId);
        this.ownedTokensIndex.set(lastTokenId, index);
      }
    }
    this.ownedTokens.delete(pairKey(owner, lastIndex));
    this.ownedTokensIndex.delete(tokenId);
    this.balances.set(owner, lastIndex);
  }

  private checkOnReceived(
    operator: Address,
    from: Address,
    to: Address,
    tokenId: bigint,
    data: Hex,
    scope: string
  ): void {
    const target = this.chain.getContract(to);
    if (target === undefined) {
      return;
    }
    if (!isTokenReceiver(target)) {
      throw new CollectionError(CollectionErrorCode.TRANSFER_TO_NON_RECEIVER, scope);
    }
    const { value } = this.chain.call(this.address, () => target.onERC721Received(operator, from, tokenId, data));
    ensure(value === ERC721_RECEIVED, CollectionErrorCode.TRANSFER_TO_NON_RECEIVER, scope);
  }
}

/**
 * ERC721 collection with an item catalogue
 *
 * Tokens are issued against catalogue items; each token ID encodes the item
 * and its issue number. Deployed as minimal-proxy clones by the factory and
 * configured through `initialize`.
 */

import type {
  CollectionInitParams,
  DecodedTokenId,
  Item,
  ItemInput,
  MinterAllowance,
  Receipt,
  TxOptions,
} from '../models/interfaces.js';
import { type Address, toAddress } from '../utils/address.js';
import { type Hex, isBytes32 } from '../utils/buffer-utils.js';
import { EMPTY_HASH, ZERO_ADDRESS } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { recoverSigner } from '../utils/signing.js';
import { type CollectionCall, dispatchCollectionCall } from './collection-calls.js';
import type { Contract } from './contract.js';
import { CallFailedError, CollectionError, CollectionErrorCode, ensure } from './errors.js';
import { ItemCatalogue } from './item-catalogue.js';
import {
  type LifecycleState,
  type Transition,
  UNINITIALIZED,
  applyTransition,
  completeLifecycle,
  initializeLifecycle,
  isCompleted,
  mintingBlocker,
  setApprovedLifecycle,
  setEditableLifecycle,
} from './lifecycle.js';
import {
  domainSeparator,
  encodeCollectionCall,
  metaTransactionDigest,
} from './meta-transaction.js';
import { PermissionRegistry } from './permissions.js';
import { decodeTokenId, encodeTokenId } from './token-id.js';
import { NonFungibleLedger } from './token-ledger.js';
import { toBigInt } from './utils.js';

export class ERC721CollectionV2 extends NonFungibleLedger {
  private readonly lifecycleSlot = this.slot<LifecycleState>(UNINITIALIZED);
  private readonly baseURISlot = this.slot('');
  private readonly proofSlot = this.slot<Hex>(EMPTY_HASH);
  private readonly metaNonces = this.map<Address, bigint>();
  private readonly catalogue = new ItemCatalogue(this.chain.journal, (event) => this.emit(event));
  private readonly permissions = new PermissionRegistry(this.chain.journal, (event) => this.emit(event));

  /**
   * Fresh, uninitialized instance of this implementation at `address`
   */
  cloneAt(address: Address): ERC721CollectionV2 {
    return new ERC721CollectionV2(this.chain, address);
  }

  // ==========================================================================
  // Initialization and lifecycle
  // ==========================================================================

  /**
   * Configure a freshly deployed clone. The caller becomes the owner.
   */
  initialize(params: CollectionInitParams, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'initialize';
      const state = applyTransition(initializeLifecycle(this.lifecycleSlot.get(), this.chain.now()), scope);
      const proofOfCreation = params.proofOfCreation ?? EMPTY_HASH;
      ensure(isBytes32(proofOfCreation), CollectionErrorCode.INVALID_SALT, scope);

      this.setNameAndSymbol(params.name, params.symbol);
      this.setOwner(sender);
      this.lifecycleSlot.set(state);
      this.permissions.setCreator(params.creator, scope);
      this.writeBaseURI(params.baseURI);
      this.proofSlot.set(proofOfCreation);

      for (const item of params.items ?? []) {
        this.catalogue.add(item, '_addItem');
      }

      if (params.shouldComplete) {
        this.complete(scope);
      }
    });
  }

  lifecycle(): LifecycleState {
    return this.lifecycleSlot.get();
  }

  isInitialized(): boolean {
    return this.lifecycleSlot.get().status === 'initialized';
  }

  isApproved(): boolean {
    const state = this.lifecycleSlot.get();
    return state.status === 'initialized' && state.approved;
  }

  isEditable(): boolean {
    const state = this.lifecycleSlot.get();
    return state.status === 'initialized' && state.editable;
  }

  isCompleted(): boolean {
    return isCompleted(this.lifecycleSlot.get());
  }

  createdAt(): number | undefined {
    const state = this.lifecycleSlot.get();
    return state.status === 'initialized' ? state.createdAt : undefined;
  }

  completedAt(): number | undefined {
    const state = this.lifecycleSlot.get();
    return state.status === 'initialized' && state.completion.kind === 'completed'
      ? state.completion.completedAt
      : undefined;
  }

  proofOfCreation(): Hex {
    return this.proofSlot.get();
  }

  isMintingAllowed(): boolean {
    return mintingBlocker(this.lifecycleSlot.get(), this.chain.now()) === undefined;
  }

  /**
   * @throws CollectionError NOT_APPROVED, NOT_COMPLETED or IN_GRACE_PERIOD
   */
  assertMintingAllowed(): void {
    const blocker = mintingBlocker(this.lifecycleSlot.get(), this.chain.now());
    if (blocker !== undefined) {
      throw new CollectionError(blocker, 'isMintingAllowed');
    }
  }

  setApproved(value: boolean, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setApproved');
      const previousValue = this.isApproved();
      this.moveTo(setApprovedLifecycle(this.lifecycleSlot.get(), value), 'setApproved');
      this.emit({ event: 'SetApproved', args: { previousValue, newValue: value } });
    });
  }

  setEditable(value: boolean, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setEditable');
      const previousValue = this.isEditable();
      this.moveTo(setEditableLifecycle(this.lifecycleSlot.get(), value), 'setEditable');
      this.emit({ event: 'SetEditable', args: { previousValue, newValue: value } });
    });
  }

  completeCollection(opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyCreator(sender);
      this.complete('completeCollection');
    });
  }

  baseURI(): string {
    return this.baseURISlot.get();
  }

  setBaseURI(baseURI: string, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      this.onlyOwner(sender, 'setBaseURI');
      this.writeBaseURI(baseURI);
    });
  }

  tokenURI(tokenId: bigint): string {
    ensure(this.exists(tokenId), CollectionErrorCode.INVALID_TOKEN_ID, 'tokenURI');
    const { itemId, issuedId } = decodeTokenId(tokenId);
    return `${this.baseURISlot.get()}${this.address}/${itemId}/${issuedId}`;
  }

  // ==========================================================================
  // Roles
  // ==========================================================================

  creator(): Address {
    return this.permissions.creator();
  }

  globalMinters(account: Address): boolean {
    return this.permissions.isGlobalMinter(account);
  }

  globalManagers(account: Address): boolean {
    return this.permissions.isGlobalManager(account);
  }

  itemMinters(itemId: bigint | number, account: Address): MinterAllowance {
    return this.permissions.itemMinterAllowance(toBigInt(itemId, 'itemId'), account);
  }

  itemManagers(itemId: bigint | number, account: Address): boolean {
    return this.permissions.isItemManager(toBigInt(itemId, 'itemId'), account);
  }

  isAuthorizedToMint(account: Address, itemId: bigint | number): boolean {
    return this.permissions.canMint(account, toBigInt(itemId, 'itemId'));
  }

  isAuthorizedToManage(account: Address, itemId: bigint | number): boolean {
    return this.permissions.canManage(account, toBigInt(itemId, 'itemId'));
  }

  transferCreatorship(newCreator: Address, opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'transferCreatorship';
      ensure(
        sender === this.owner() || this.permissions.isCreator(sender),
        CollectionErrorCode.CALLER_IS_NOT_OWNER_OR_CREATOR,
        scope
      );
      this.permissions.setCreator(newCreator, scope);
    });
  }

  setMinters(minters: Address[], values: boolean[], opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'setMinters';
      this.onlyCreator(sender);
      ensure(minters.length === values.length, CollectionErrorCode.LENGTH_MISMATCH, scope);
      minters.forEach((minter, i) => this.permissions.setGlobalMinter(minter, values[i], scope));
    });
  }

  setManagers(managers: Address[], values: boolean[], opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'setManagers';
      this.onlyCreator(sender);
      ensure(managers.length === values.length, CollectionErrorCode.LENGTH_MISMATCH, scope);
      managers.forEach((manager, i) => this.permissions.setGlobalManager(manager, values[i], scope));
    });
  }

  setItemsMinters(
    itemIds: Array<bigint | number>,
    minters: Address[],
    values: MinterAllowance[],
    opts: TxOptions
  ): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'setItemsMinters';
      this.onlyCreator(sender);
      ensure(
        itemIds.length === minters.length && minters.length === values.length,
        CollectionErrorCode.LENGTH_MISMATCH,
        scope
      );
      itemIds.forEach((rawId, i) => {
        const itemId = toBigInt(rawId, 'itemId');
        this.catalogue.require(itemId, scope);
        this.permissions.setItemMinter(itemId, minters[i], values[i], scope);
      });
    });
  }

  setItemsManagers(
    itemIds: Array<bigint | number>,
    managers: Address[],
    values: boolean[],
    opts: TxOptions
  ): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'setItemsManagers';
      this.onlyCreator(sender);
      ensure(
        itemIds.length === managers.length && managers.length === values.length,
        CollectionErrorCode.LENGTH_MISMATCH,
        scope
      );
      itemIds.forEach((rawId, i) => {
        const itemId = toBigInt(rawId, 'itemId');
        this.catalogue.require(itemId, scope);
        this.permissions.setItemManager(itemId, managers[i], values[i], scope);
      });
    });
  }

  // ==========================================================================
  // Catalogue
  // ==========================================================================

  itemsCount(): bigint {
    return this.catalogue.count();
  }

  /**
   * @throws CollectionError ITEM_DOES_NOT_EXIST
   */
  items(itemId: bigint | number): Item {
    return this.catalogue.require(itemId, 'items');
  }

  addItems(items: ItemInput[], opts: TxOptions): Receipt<bigint[]> {
    return this.transact(opts, (sender) => {
      this.onlyCreator(sender);
      ensure(!this.isCompleted(), CollectionErrorCode.COLLECTION_COMPLETED, '_addItem');
      return items.map((item) => this.catalogue.add(item, '_addItem'));
    });
  }

  editItemsSalesData(
    itemIds: Array<bigint | number>,
    prices: bigint[],
    beneficiaries: Address[],
    opts: TxOptions
  ): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'editItemsSalesData';
      ensure(
        itemIds.length === prices.length && prices.length === beneficiaries.length,
        CollectionErrorCode.LENGTH_MISMATCH,
        scope
      );
      itemIds.forEach((rawId, i) => {
        const itemId = toBigInt(rawId, 'itemId');
        this.catalogue.require(itemId, scope);
        this.onlyCreatorOrManager(sender, itemId, scope);
        this.catalogue.updateSalesData(itemId, prices[i], beneficiaries[i], scope);
      });
    });
  }

  editItemsMetadata(itemIds: Array<bigint | number>, metadatas: string[], opts: TxOptions): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'editItemsMetadata';
      ensure(this.isEditable(), CollectionErrorCode.NOT_EDITABLE, scope);
      ensure(itemIds.length === metadatas.length, CollectionErrorCode.LENGTH_MISMATCH, scope);
      itemIds.forEach((rawId, i) => {
        const itemId = toBigInt(rawId, 'itemId');
        this.catalogue.require(itemId, scope);
        this.onlyCreatorOrManager(sender, itemId, scope);
        this.catalogue.updateMetadata(itemId, metadatas[i], scope);
      });
    });
  }

  /**
   * Owner-only correction of content hashes. An empty metadata string
   * leaves that item's metadata untouched.
   */
  rescueItems(
    itemIds: Array<bigint | number>,
    contentHashes: Hex[],
    metadatas: string[],
    opts: TxOptions
  ): Receipt<void> {
    return this.transact(opts, (sender) => {
      const scope = 'rescueItems';
      this.onlyOwner(sender, scope);
      ensure(
        itemIds.length === contentHashes.length && contentHashes.length === metadatas.length,
        CollectionErrorCode.LENGTH_MISMATCH,
        scope
      );
      itemIds.forEach((rawId, i) => {
        this.catalogue.rescue(toBigInt(rawId, 'itemId'), contentHashes[i], metadatas[i], scope);
      });
    });
  }

  // ==========================================================================
  // Issuance
  // ==========================================================================

  encodeTokenId(itemId: bigint | number, issuedId: bigint | number): bigint {
    return encodeTokenId(itemId, issuedId);
  }

  decodeTokenId(tokenId: bigint): DecodedTokenId {
    return decodeTokenId(tokenId);
  }

  issueToken(beneficiary: Address, itemId: bigint | number, opts: TxOptions): Receipt<bigint> {
    return this.transact(opts, (sender) => {
      this.assertMintingAllowed();
      return this.issue(sender, beneficiary, toBigInt(itemId, 'itemId'));
    });
  }

  issueTokens(beneficiaries: Address[], itemIds: Array<bigint | number>, opts: TxOptions): Receipt<bigint[]> {
    return this.transact(opts, (sender) => {
      ensure(beneficiaries.length === itemIds.length, CollectionErrorCode.LENGTH_MISMATCH, 'issueTokens');
      this.assertMintingAllowed();
      return beneficiaries.map((beneficiary, i) => this.issue(sender, beneficiary, toBigInt(itemIds[i], 'itemId')));
    });
  }

  // ==========================================================================
  // Meta-transactions
  // ==========================================================================

  getNonce(user: Address): bigint {
    return this.metaNonces.get(toAddress(user, 'getNonce')) ?? 0n;
  }

  getChainId(): number {
    return this.chain.chainId;
  }

  domainSeparator(): Hex {
    return domainSeparator({ verifyingContract: this.address, chainId: this.chain.chainId });
  }

  /**
   * Run `call` on behalf of `user`, who signed it off-chain. The relayer
   * (`opts.from`) only pays for submission; every check inside the call
   * resolves against `user`.
   */
  executeMetaTransaction(userAddress: Address, call: CollectionCall, signature: Hex, opts: TxOptions): Receipt<unknown> {
    return this.transact(opts, (relayer) => {
      const scope = 'executeMetaTransaction';
      const user = toAddress(userAddress, scope);
      const nonce = this.getNonce(user);
      const functionSignature = encodeCollectionCall(call);
      const digest = metaTransactionDigest(
        { verifyingContract: this.address, chainId: this.chain.chainId },
        { nonce, from: user, functionSignature }
      );

      let signer: Address | undefined;
      try {
        signer = recoverSigner(digest, signature);
      } catch (error) {
        logger.warn('Meta-transaction signature did not recover', error instanceof Error ? error.message : String(error));
      }
      ensure(
        user !== ZERO_ADDRESS && signer === user,
        CollectionErrorCode.SIGNER_AND_SIGNATURE_DO_NOT_MATCH,
        scope
      );

      this.metaNonces.set(user, nonce + 1n);
      this.emit({
        event: 'MetaTransactionExecuted',
        args: { userAddress: user, relayerAddress: relayer, functionSignature },
      });

      try {
        return dispatchCollectionCall(this, call, { from: user });
      } catch (error) {
        throw new CallFailedError(scope, error);
      }
    });
  }

  // ==========================================================================
  // Internal
  // ==========================================================================

  private issue(sender: Address, account: Address, itemId: bigint): bigint {
    const scope = '_issueToken';
    const beneficiary = toAddress(account, scope);
    const item = this.catalogue.require(itemId, scope);
    ensure(item.totalSupply < item.maxSupply, CollectionErrorCode.ITEM_EXHAUSTED, scope);
    ensure(this.permissions.canMint(sender, itemId), CollectionErrorCode.CALLER_CAN_NOT_MINT, scope);

    const issuedId = this.catalogue.recordIssue(itemId, scope);
    const tokenId = encodeTokenId(itemId, issuedId);
    this.mintToken(beneficiary, tokenId, scope);
    this.permissions.chargeMint(sender, itemId, scope);

    this.emit({ event: 'Issue', args: { beneficiary, tokenId, itemId, issuedId, caller: sender } });
    return tokenId;
  }

  private complete(scope: string): void {
    const now = this.chain.now();
    this.moveTo(completeLifecycle(this.lifecycleSlot.get(), now), scope);
    this.emit({ event: 'Complete', args: { completedAt: now } });
  }

  private moveTo(transition: Transition, scope: string): void {
    this.lifecycleSlot.set(applyTransition(transition, scope));
  }

  private writeBaseURI(baseURI: string): void {
    const oldBaseURI = this.baseURISlot.get();
    this.baseURISlot.set(baseURI);
    this.emit({ event: 'BaseURI', args: { oldBaseURI, newBaseURI: baseURI } });
  }

  private onlyCreator(sender: Address): void {
    ensure(this.permissions.isCreator(sender), CollectionErrorCode.CALLER_IS_NOT_CREATOR, 'onlyCreator');
  }

  private onlyCreatorOrManager(sender: Address, itemId: bigint, scope: string): void {
    ensure(this.permissions.canManage(sender, itemId), CollectionErrorCode.CALLER_IS_NOT_CREATOR_OR_MANAGER, scope);
  }
}

export function isCollection(contract: Contract): contract is ERC721CollectionV2 {
  return contract instanceof ERC721CollectionV2;
}

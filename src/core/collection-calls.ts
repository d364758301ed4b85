/**
 * Typed calls into a collection
 *
 * Forwarders and meta-transactions carry a call as data instead of invoking
 * a method directly. A CollectionCall names one state-changing method and
 * its arguments; `dispatchCollectionCall` runs it.
 */

import type { ItemInput, MinterAllowance, TxOptions } from '../models/interfaces.js';
import type { Address } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import type { ERC721CollectionV2 } from './collection.js';

export type CollectionCall =
  | { method: 'setApproved'; args: { value: boolean } }
  | { method: 'setEditable'; args: { value: boolean } }
  | { method: 'setBaseURI'; args: { baseURI: string } }
  | { method: 'completeCollection'; args: Record<string, never> }
  | { method: 'transferCreatorship'; args: { creator: Address } }
  | { method: 'transferOwnership'; args: { newOwner: Address } }
  | { method: 'addItems'; args: { items: ItemInput[] } }
  | { method: 'editItemsSalesData'; args: { itemIds: bigint[]; prices: bigint[]; beneficiaries: Address[] } }
  | { method: 'editItemsMetadata'; args: { itemIds: bigint[]; metadatas: string[] } }
  | { method: 'rescueItems'; args: { itemIds: bigint[]; contentHashes: Hex[]; metadatas: string[] } }
  | { method: 'setMinters'; args: { minters: Address[]; values: boolean[] } }
  | { method: 'setManagers'; args: { managers: Address[]; values: boolean[] } }
  | { method: 'setItemsMinters'; args: { itemIds: bigint[]; minters: Address[]; values: MinterAllowance[] } }
  | { method: 'setItemsManagers'; args: { itemIds: bigint[]; managers: Address[]; values: boolean[] } }
  | { method: 'issueToken'; args: { beneficiary: Address; itemId: bigint } }
  | { method: 'issueTokens'; args: { beneficiaries: Address[]; itemIds: bigint[] } }
  | { method: 'approve'; args: { to: Address; tokenId: bigint } }
  | { method: 'setApprovalForAll'; args: { operator: Address; approved: boolean } }
  | { method: 'transferFrom'; args: { from: Address; to: Address; tokenId: bigint } }
  | { method: 'safeTransferFrom'; args: { from: Address; to: Address; tokenId: bigint; data?: Hex } }
  | { method: 'batchTransferFrom'; args: { from: Address; to: Address; tokenIds: bigint[] } }
  | { method: 'safeBatchTransferFrom'; args: { from: Address; to: Address; tokenIds: bigint[]; data?: Hex } };

export type CollectionMethod = CollectionCall['method'];

/**
 * Run `call` against `collection` as a call from `opts.from`
 * @returns the method's return value
 */
export function dispatchCollectionCall(collection: ERC721CollectionV2, call: CollectionCall, opts: TxOptions): unknown {
  switch (call.method) {
    case 'setApproved':
      return collection.setApproved(call.args.value, opts).value;
    case 'setEditable':
      return collection.setEditable(call.args.value, opts).value;
    case 'setBaseURI':
      return collection.setBaseURI(call.args.baseURI, opts).value;
    case 'completeCollection':
      return collection.completeCollection(opts).value;
    case 'transferCreatorship':
      return collection.transferCreatorship(call.args.creator, opts).value;
    case 'transferOwnership':
      return collection.transferOwnership(call.args.newOwner, opts).value;
    case 'addItems':
      return collection.addItems(call.args.items, opts).value;
    case 'editItemsSalesData': {
      const { itemIds, prices, beneficiaries } = call.args;
      return collection.editItemsSalesData(itemIds, prices, beneficiaries, opts).value;
    }
    case 'editItemsMetadata':
      return collection.editItemsMetadata(call.args.itemIds, call.args.metadatas, opts).value;
    case 'rescueItems': {
      const { itemIds, contentHashes, metadatas } = call.args;
      return collection.rescueItems(itemIds, contentHashes, metadatas, opts).value;
    }
    case 'setMinters':
      return collection.setMinters(call.args.minters, call.args.values, opts).value;
    case 'setManagers':
      return collection.setManagers(call.args.managers, call.args.values, opts).value;
    case 'setItemsMinters': {
      const { itemIds, minters, values } = call.args;
      return collection.setItemsMinters(itemIds, minters, values, opts).value;
    }
    case 'setItemsManagers': {
      const { itemIds, managers, values } = call.args;
      return collection.setItemsManagers(itemIds, managers, values, opts).value;
    }
    case 'issueToken':
      return collection.issueToken(call.args.beneficiary, call.args.itemId, opts).value;
    case 'issueTokens':
      return collection.issueTokens(call.args.beneficiaries, call.args.itemIds, opts).value;
    case 'approve':
      return collection.approve(call.args.to, call.args.tokenId, opts).value;
    case 'setApprovalForAll':
      return collection.setApprovalForAll(call.args.operator, call.args.approved, opts).value;
    case 'transferFrom': {
      const { from, to, tokenId } = call.args;
      return collection.transferFrom(from, to, tokenId, opts).value;
    }
    case 'safeTransferFrom': {
      const { from, to, tokenId, data } = call.args;
      return collection.safeTransferFrom(from, to, tokenId, opts, data).value;
    }
    case 'batchTransferFrom': {
      const { from, to, tokenIds } = call.args;
      return collection.batchTransferFrom(from, to, tokenIds, opts).value;
    }
    case 'safeBatchTransferFrom': {
      const { from, to, tokenIds, data } = call.args;
      return collection.safeBatchTransferFrom(from, to, tokenIds, opts, data).value;
    }
    default: {
      const exhaustive: never = call;
      throw new Error(`Unknown collection call: ${JSON.stringify(exhaustive)}`);
    }
  }
}

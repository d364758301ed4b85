/**
 * Events emitted by collections, factories and the manager trio
 */

import type { Address } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import type { Item, MinterAllowance } from './interfaces.js';

export type ContractEvent =
  | { event: 'OwnershipTransferred'; args: { previousOwner: Address; newOwner: Address } }
  | { event: 'SetApproved'; args: { previousValue: boolean; newValue: boolean } }
  | { event: 'SetEditable'; args: { previousValue: boolean; newValue: boolean } }
  | { event: 'Complete'; args: { completedAt: number } }
  | { event: 'BaseURI'; args: { oldBaseURI: string; newBaseURI: string } }
  | { event: 'CreatorshipTransferred'; args: { previousCreator: Address; newCreator: Address } }
  | { event: 'AddItem'; args: { itemId: bigint; item: Item } }
  | { event: 'UpdateItemSalesData'; args: { itemId: bigint; price: bigint; beneficiary: Address } }
  | { event: 'UpdateItemMetadata'; args: { itemId: bigint; metadata: string } }
  | { event: 'RescueItem'; args: { itemId: bigint; contentHash: Hex; metadata: string } }
  | { event: 'SetGlobalMinter'; args: { minter: Address; value: boolean } }
  | { event: 'SetGlobalManager'; args: { manager: Address; value: boolean } }
  | { event: 'SetItemMinter'; args: { itemId: bigint; minter: Address; allowance: MinterAllowance } }
  | { event: 'SetItemManager'; args: { itemId: bigint; manager: Address; value: boolean } }
  | {
      event: 'Issue';
      args: { beneficiary: Address; tokenId: bigint; itemId: bigint; issuedId: bigint; caller: Address };
    }
  | { event: 'Transfer'; args: { from: Address; to: Address; tokenId: bigint } }
  | { event: 'Approval'; args: { owner: Address; approved: Address; tokenId: bigint } }
  | { event: 'ApprovalForAll'; args: { owner: Address; operator: Address; approved: boolean } }
  | {
      event: 'MetaTransactionExecuted';
      args: { userAddress: Address; relayerAddress: Address; functionSignature: Hex };
    }
  | { event: 'ProxyCreated'; args: { address: Address; salt: Hex } }
  | { event: 'AcceptedTokenSet'; args: { oldAcceptedToken: Address; newAcceptedToken: Address } }
  | { event: 'CommitteeSet'; args: { oldCommittee: Address; newCommittee: Address } }
  | { event: 'FeesCollectorSet'; args: { oldFeesCollector: Address; newFeesCollector: Address } }
  | { event: 'PricePerItemSet'; args: { oldPricePerItem: bigint; newPricePerItem: bigint } }
  | { event: 'MemberSet'; args: { member: Address; value: boolean } }
  | { event: 'CallerSet'; args: { oldCaller: Address; newCaller: Address } };

export type EventName = ContractEvent['event'];

/** Event as recorded by the chain, tagged with the emitting contract */
export type EventLog = ContractEvent & { address: Address };

export type LogOf<N extends EventName> = Extract<EventLog, { event: N }>;

/**
 * Logs of one event type, in emission order
 */
export function findEvents<N extends EventName>(logs: readonly EventLog[], name: N): LogOf<N>[] {
  return logs.filter((log): log is LogOf<N> => log.event === name);
}

/**
 * nft-collection-core
 * Deterministic NFT collection factory, item catalogue and token issuance
 * engine on an in-process ledger
 */

// Models
export * from './models/index.js';

// Utilities
export * from './utils/index.js';

// Ledger
export { Chain } from './core/chain.js';
export { Contract, Ownable } from './core/contract.js';
export { Journal, StorageMap, StorageSlot, StorageList } from './core/storage.js';
export * from './core/errors.js';
export { readChainConfig, createChainFromEnv } from './core/config-reader.js';
export type { Environment } from './core/config-reader.js';

// Collection core
export * from './core/token-id.js';
export * from './core/rarities.js';
export * from './core/allowance.js';
export * from './core/lifecycle.js';
export * from './core/addressing.js';
export { ItemCatalogue } from './core/item-catalogue.js';
export { PermissionRegistry } from './core/permissions.js';
export { NonFungibleLedger, isTokenReceiver } from './core/token-ledger.js';
export type { TokenReceiver } from './core/token-ledger.js';
export { ERC721CollectionV2, isCollection } from './core/collection.js';
export { dispatchCollectionCall } from './core/collection-calls.js';
export type { CollectionCall, CollectionMethod } from './core/collection-calls.js';
export * from './core/meta-transaction.js';

// Factory
export { MinimalProxyFactory } from './core/proxy-factory.js';
export type { ProxyImplementation } from './core/proxy-factory.js';
export { ERC721CollectionFactoryV2, isCollectionFactory } from './core/collection-factory.js';
export type { CollectionFactoryParams } from './core/collection-factory.js';

// Manager
export { isFungibleToken } from './core/fungible-token.js';
export type { FungibleToken } from './core/fungible-token.js';
export { Forwarder, isForwarder } from './core/forwarder.js';
export type { ForwarderParams } from './core/forwarder.js';
export { Committee } from './core/committee.js';
export type { CommitteeParams } from './core/committee.js';
export { CollectionManager, isCollectionManager } from './core/collection-manager.js';
export type { CollectionManagerParams, ManagedCollectionParams } from './core/collection-manager.js';

export { toBigInt } from './core/utils.js';

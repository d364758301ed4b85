/**
 * Collection Flow Example
 *
 * Flow:
 * 1) Deploy the collection implementation and the factory.
 * 2) Create a collection at a predictable address with three items.
 * 3) Wait out the grace period and issue tokens as the creator.
 * 4) Transfer one token and print the holders.
 *
 * Env:
 * - COLLECTIONS_CHAIN_ID, COLLECTIONS_GENESIS_TIMESTAMP, COLLECTIONS_LOG_LEVEL
 */
import {
  ERC721CollectionFactoryV2,
  ERC721CollectionV2,
  GRACE_PERIOD,
  ZERO_ADDRESS,
  addressFromPrivateKey,
  configureLogger,
  createChainFromEnv,
  isCollectionError,
} from '../src/index.js';
import type { Hex, ItemInput } from '../src/index.js';

function key(n: number): Hex {
  return `0x${n.toString(16).padStart(64, '0')}`;
}

function main(): void {
  configureLogger({ enabled: true, level: 'info' });
  const chain = createChainFromEnv();

  const deployer = addressFromPrivateKey(key(1));
  const owner = addressFromPrivateKey(key(2));
  const creator = addressFromPrivateKey(key(3));
  const collector = addressFromPrivateKey(key(4));
  const friend = addressFromPrivateKey(key(5));

  // === DEPLOY ===
  const implementation = chain.deploy(deployer, (address) => new ERC721CollectionV2(chain, address)).value;
  const factory = chain.deploy(
    deployer,
    (address) => new ERC721CollectionFactoryV2(chain, address, { implementation: implementation.address, owner })
  ).value;

  // === CREATE ===
  const salt: Hex = `0x${'01'.padStart(64, '0')}`;
  console.log(`Predicted collection address: ${factory.getAddress(salt, creator)}`);

  const items: ItemInput[] = [
    { rarity: 'common', price: 100n, beneficiary: creator, metadata: '1:hoodie:upper_body:BaseMale' },
    { rarity: 'legendary', price: 2500n, beneficiary: creator, metadata: '1:crown:hat:BaseFemale' },
    { rarity: 'mythic', price: 0n, beneficiary: ZERO_ADDRESS, metadata: '1:halo:hat:BaseMale,BaseFemale' },
  ];

  const receipt = factory.createCollection(
    salt,
    {
      name: 'Example Collection',
      symbol: 'EXC',
      baseURI: 'https://api.example.test/v2/',
      creator,
      shouldComplete: true,
      items,
    },
    { from: creator }
  );
  const collection = receipt.value;
  console.log(`Collection ${collection.address} created with ${collection.itemsCount()} items`);
  console.log(`Events: ${receipt.logs.map((log) => log.event).join(', ')}`);
  console.log(`Valid collection: ${factory.isValidCollection(collection.address)}`);

  // === ISSUE ===
  try {
    collection.issueToken(collector, 0, { from: creator });
  } catch (error) {
    if (!isCollectionError(error)) throw error;
    console.log(`Issuance refused during grace period: ${error.code}`);
  }

  chain.increaseTime(GRACE_PERIOD);
  const tokenIds = collection.issueTokens([collector, collector, friend], [0, 1, 2], { from: creator }).value;
  for (const tokenId of tokenIds) {
    const { itemId, issuedId } = collection.decodeTokenId(tokenId);
    console.log(`Token ${tokenId} -> item ${itemId} #${issuedId}: ${collection.tokenURI(tokenId)}`);
  }

  // === TRANSFER ===
  collection.transferFrom(collector, friend, tokenIds[0], { from: collector });
  console.log(`Collector holds ${collection.balanceOf(collector)}, friend holds ${collection.balanceOf(friend)}`);
}

main();

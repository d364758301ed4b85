/**
 * Shared constants for the collection platform
 */

/**
 * Token ID layout: itemId in the high 40 bits, issuedId in the low 216 bits
 */
export const TOKEN_ID = {
  ITEM_ID_BITS: 40n,
  ISSUED_ID_BITS: 216n,
  MAX_ITEM_ID: (1n << 40n) - 1n,
  MAX_ISSUED_ID: (1n << 216n) - 1n,
} as const;

export const UINT256_MAX = (1n << 256n) - 1n;

/**
 * Seconds between completion and the first primary issuance
 */
export const GRACE_PERIOD = 86_400;

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000' as const;

export const EMPTY_HASH = '0x0000000000000000000000000000000000000000000000000000000000000000' as const;

/**
 * Return value of onERC721Received(address,address,uint256,bytes)
 */
export const ERC721_RECEIVED = '0x150b7a02' as const;

/**
 * EIP-712 domain used by collection meta-transactions
 */
export const META_TRANSACTION = {
  DOMAIN_NAME: 'NFT Collection',
  DOMAIN_VERSION: '2',
  DOMAIN_TYPE: 'EIP712Domain(string name,string version,address verifyingContract,bytes32 salt)',
  TRANSACTION_TYPE: 'MetaTransaction(uint256 nonce,address from,bytes functionSignature)',
} as const;

/**
 * Defaults for a freshly created chain
 */
export const DEFAULTS = {
  CHAIN_ID: 1337,
} as const;

export const LIMITS = {
  HASH_SIZE: 32,
  SIGNATURE_SIZE: 65,
} as const;

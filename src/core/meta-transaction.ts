/**
 * EIP-712 meta-transactions
 *
 * A relayer submits a call signed by the user; the collection checks the
 * signature against its typed-data domain and the user's nonce, then runs
 * the call with the user as the logical caller.
 *
 * The domain carries the chain id as its `salt`, and the signed payload is
 * the canonical JSON of a {@link CollectionCall}.
 */

import {
  bytesToHex,
  encodeAbiParameters,
  hashTypedData,
  keccak256,
  numberToHex,
  stringToHex,
  type TypedDataDomain,
} from 'viem';
import type { Address } from '../utils/address.js';
import type { Hex } from '../utils/buffer-utils.js';
import { canonicalJsonBytes } from '../utils/canonical-json.js';
import { META_TRANSACTION } from '../utils/constants.js';
import { type PrivateKey, signDigest } from '../utils/signing.js';
import type { CollectionCall } from './collection-calls.js';

export const DOMAIN_TYPEHASH = keccak256(stringToHex(META_TRANSACTION.DOMAIN_TYPE));
export const META_TRANSACTION_TYPEHASH = keccak256(stringToHex(META_TRANSACTION.TRANSACTION_TYPE));

export const META_TRANSACTION_TYPES = {
  MetaTransaction: [
    { name: 'nonce', type: 'uint256' },
    { name: 'from', type: 'address' },
    { name: 'functionSignature', type: 'bytes' },
  ],
} as const;

export interface MetaTransaction {
  nonce: bigint;
  from: Address;
  functionSignature: Hex;
}

export interface DomainParams {
  verifyingContract: Address;
  chainId: number | bigint;
  name?: string;
  version?: string;
}

/**
 * viem domain for a collection: `EIP712Domain(name, version, verifyingContract, salt)`
 */
export function typedDataDomain(params: DomainParams): TypedDataDomain {
  return {
    name: params.name ?? META_TRANSACTION.DOMAIN_NAME,
    version: params.version ?? META_TRANSACTION.DOMAIN_VERSION,
    verifyingContract: params.verifyingContract,
    salt: numberToHex(BigInt(params.chainId), { size: 32 }),
  };
}

export function domainSeparator(params: DomainParams): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'bytes32' }, { type: 'bytes32' }, { type: 'address' }, { type: 'bytes32' }],
      [
        DOMAIN_TYPEHASH,
        keccak256(stringToHex(params.name ?? META_TRANSACTION.DOMAIN_NAME)),
        keccak256(stringToHex(params.version ?? META_TRANSACTION.DOMAIN_VERSION)),
        params.verifyingContract,
        numberToHex(BigInt(params.chainId), { size: 32 }),
      ]
    )
  );
}

export function hashMetaTransaction(tx: MetaTransaction): Hex {
  return keccak256(
    encodeAbiParameters(
      [{ type: 'bytes32' }, { type: 'uint256' }, { type: 'address' }, { type: 'bytes32' }],
      [META_TRANSACTION_TYPEHASH, tx.nonce, tx.from, keccak256(tx.functionSignature)]
    )
  );
}

/**
 * `keccak256(0x1901 ‖ domainSeparator ‖ hashMetaTransaction(tx))`
 */
export function metaTransactionDigest(domain: DomainParams, tx: MetaTransaction): Hex {
  return hashTypedData({
    domain: typedDataDomain(domain),
    types: META_TRANSACTION_TYPES,
    primaryType: 'MetaTransaction',
    message: tx,
  });
}

/**
 * Wire form of a call: canonical JSON, bigint values as `{"$bigint": "..."}`
 */
export function encodeCollectionCall(call: CollectionCall): Hex {
  return bytesToHex(canonicalJsonBytes(call));
}

/**
 * Client-side helper: sign `call` for execution by `from` at `nonce`
 */
export function signMetaTransaction(
  domain: DomainParams,
  tx: { nonce: bigint; from: Address; call: CollectionCall },
  privateKey: PrivateKey
): Hex {
  const digest = metaTransactionDigest(domain, {
    nonce: tx.nonce,
    from: tx.from,
    functionSignature: encodeCollectionCall(tx.call),
  });
  return signDigest(digest, privateKey);
}

/**
 * secp256k1 signing helpers for meta-transactions
 *
 * Signing and recovery stay synchronous so they can run inside a ledger
 * call; address derivation goes through viem.
 */

import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex } from 'viem';
import { privateKeyToAddress, publicKeyToAddress } from 'viem/accounts';
import { type Address, toAddress } from './address.js';
import { type Hex, fromHex } from './buffer-utils.js';
import { LIMITS } from './constants.js';

export type PrivateKey = Hex | Uint8Array;

function toBytes(value: Hex | Uint8Array): Uint8Array {
  return typeof value === 'string' ? fromHex(value) : value;
}

/**
 * Account address of an uncompressed (65-byte) public key
 */
export function addressFromPublicKey(publicKey: Uint8Array): Address {
  if (publicKey.length !== 65 || publicKey[0] !== 0x04) {
    throw new Error('Expected an uncompressed secp256k1 public key');
  }
  return toAddress(publicKeyToAddress(bytesToHex(publicKey)), 'addressFromPublicKey');
}

export function addressFromPrivateKey(privateKey: PrivateKey): Address {
  const key = typeof privateKey === 'string' ? privateKey : bytesToHex(privateKey);
  return toAddress(privateKeyToAddress(key), 'addressFromPrivateKey');
}

/**
 * Sign a 32-byte digest, returning `r ‖ s ‖ v` with v in {27, 28}
 */
export function signDigest(digest: Hex | Uint8Array, privateKey: PrivateKey): Hex {
  const hash = toBytes(digest);
  if (hash.length !== LIMITS.HASH_SIZE) {
    throw new Error(`Digest must be ${LIMITS.HASH_SIZE} bytes`);
  }
  const signature = secp256k1.sign(hash, toBytes(privateKey));
  return bytesToHex(Buffer.concat([signature.toCompactRawBytes(), Buffer.from([27 + signature.recovery])]));
}

/**
 * Recover the signer address of a 65-byte signature over `digest`
 * @throws Error when the signature is malformed or does not recover
 */
export function recoverSigner(digest: Hex | Uint8Array, signature: Hex | Uint8Array): Address {
  const bytes = toBytes(signature);
  if (bytes.length !== LIMITS.SIGNATURE_SIZE) {
    throw new Error(`Signature must be ${LIMITS.SIGNATURE_SIZE} bytes`);
  }
  const v = bytes[64];
  const recovery = v >= 27 ? v - 27 : v;
  if (recovery !== 0 && recovery !== 1) {
    throw new Error(`Invalid recovery id: ${v}`);
  }
  const publicKey = secp256k1.Signature.fromCompact(bytes.subarray(0, 64))
    .addRecoveryBit(recovery)
    .recoverPublicKey(toBytes(digest))
    .toRawBytes(false);
  return addressFromPublicKey(publicKey);
}

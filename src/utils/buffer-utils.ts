/**
 * Hex helpers shared by the addressing and signing code
 */

import { size } from 'viem';

export type Hex = `0x${string}`;

const HEX_PATTERN = /^0x(?:[0-9a-fA-F]{2})*$/;

/**
 * 0x-prefixed hex of whole bytes
 */
export function isHex(value: unknown): value is Hex {
  return typeof value === 'string' && HEX_PATTERN.test(value);
}

export function isBytes32(value: unknown): value is Hex {
  return isHex(value) && size(value) === 32;
}

/**
 * Parse 0x-prefixed hex into bytes
 * @throws Error on odd length or non-hex characters
 */
export function fromHex(value: string): Buffer {
  if (!HEX_PATTERN.test(value)) {
    throw new Error(`Invalid hex string: ${value.slice(0, 16)}`);
  }
  return Buffer.from(value.slice(2), 'hex');
}

import { bytesToHex, hexToBytes, type Hex } from 'viem';
import { type Result, Ok, Err, mapResult } from './result.js';

export const BYTES_PER_ROOT = 32;
export const BYTES_PER_COMMITMENT = 48;
export const BYTES_PER_PROOF = 48;
export const BYTES_PER_SIGNATURE = 96;
export const BYTES_PER_BLOB = 131072;

// Lower-case only, which is what bytesToHex emits, so parsed values round-trip
const LOWER_HEX = /^0x[0-9a-f]*$/;

const isLowerHex = (value: string): value is Hex => LOWER_HEX.test(value) && value.length % 2 === 0;

/** True when `value` is 0x-prefixed lower-case hex encoding exactly `byteLength` bytes. */
export const isFixedHex = (value: string, byteLength: number): boolean =>
  value.length === 2 + byteLength * 2 && LOWER_HEX.test(value);

export const parseFixedHex = (value: string, byteLength: number): Result<Uint8Array> => {
  if (!isLowerHex(value)) {
    return Err(new Error('not a 0x-prefixed lower-case hex string'));
  }
  const actualLength = (value.length - 2) / 2;
  if (actualLength !== byteLength) {
    return Err(new Error(`expected ${byteLength} bytes, got ${actualLength}`));
  }
  return Ok(hexToBytes(value));
};

// Zero-length root: the slot has no header.
export type BlockRoot = Uint8Array;

export const EMPTY_BLOCK_ROOT: BlockRoot = new Uint8Array(0);

export const isEmptyBlockRoot = (root: BlockRoot): boolean => root.length === 0;

export const parseBlockRoot = (value: string): Result<BlockRoot> =>
  value === '' ? Ok(EMPTY_BLOCK_ROOT) : parseFixedHex(value, BYTES_PER_ROOT);

export const blockRootToHex = (root: BlockRoot): string =>
  isEmptyBlockRoot(root) ? '' : bytesToHex(root);

export const parseFixedHexToBuffer = (value: string, byteLength: number): Result<Buffer> =>
  mapResult(parseFixedHex(value, byteLength), (bytes) => Buffer.from(bytes));

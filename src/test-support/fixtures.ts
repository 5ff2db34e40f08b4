import type { Hex } from 'viem';
import type { SidecarRecord, SignedHeaderSummary } from '../beacon-client/types.js';
import { BYTES_PER_BLOB } from '../shared/hex.js';

export const repeatHex = (byte: string, byteLength: number): string => `0x${byte.repeat(byteLength)}`;

// Distinct, lowercase, 32-byte root per slot
export const rootFor = (slot: number): Hex => `0x${slot.toString(16).padStart(64, '0')}`;

export const makeHeader = (slot: number): SignedHeaderSummary => ({
  message: {
    slot: String(slot),
    proposer_index: '7',
    parent_root: repeatHex('11', 32),
    state_root: repeatHex('22', 32),
    body_root: repeatHex('33', 32),
  },
  signature: repeatHex('cc', 96),
});

export const makeSidecar = (slot: number, index = 0): SidecarRecord => ({
  index: String(index),
  blob: repeatHex('00', BYTES_PER_BLOB),
  kzg_commitment: repeatHex('aa', 48),
  kzg_proof: repeatHex('bb', 48),
  signed_block_header: makeHeader(slot),
  kzg_commitment_inclusion_proof: [repeatHex('44', 32), repeatHex('55', 32)],
});

export const jsonResponse = (body: unknown, status = 200) => ({ status, body: JSON.stringify(body) });

export const notFoundResponse = () => jsonResponse({ code: 404, message: 'NOT_FOUND' }, 404);

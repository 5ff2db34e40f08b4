import { z } from 'zod';
import {
  BYTES_PER_BLOB,
  BYTES_PER_COMMITMENT,
  BYTES_PER_PROOF,
  BYTES_PER_ROOT,
  BYTES_PER_SIGNATURE,
  isFixedHex,
} from '../shared/hex.js';

const fixedHex = (byteLength: number) =>
  z.string().refine((value) => isFixedHex(value, byteLength), {
    message: `expected 0x-prefixed hex of ${byteLength} bytes`,
  });

const decimalString = z.string().regex(/^\d+$/, 'expected a decimal integer string');

export const signedBlockHeaderSchema = z.object({
  message: z.object({
    slot: decimalString,
    proposer_index: decimalString,
    parent_root: fixedHex(BYTES_PER_ROOT),
    state_root: fixedHex(BYTES_PER_ROOT),
    body_root: fixedHex(BYTES_PER_ROOT),
  }),
  signature: fixedHex(BYTES_PER_SIGNATURE),
});

export const blobSidecarSchema = z.object({
  index: decimalString,
  blob: fixedHex(BYTES_PER_BLOB),
  kzg_commitment: fixedHex(BYTES_PER_COMMITMENT),
  kzg_proof: fixedHex(BYTES_PER_PROOF),
  signed_block_header: signedBlockHeaderSchema,
  kzg_commitment_inclusion_proof: z.array(fixedHex(BYTES_PER_ROOT)),
});

// /eth/v1/beacon/blob_sidecars/{slot}
export const blobSidecarsResponseSchema = z.object({
  data: z.array(blobSidecarSchema),
});

// Root stays a plain string here; the correlator owns its conversion to bytes
const blockHeaderDataSchema = z.object({
  root: z.string(),
  canonical: z.boolean(),
  header: signedBlockHeaderSchema,
});

// /eth/v1/beacon/headers
export const blockHeadersResponseSchema = z.object({
  execution_optimistic: z.boolean(),
  finalized: z.boolean(),
  data: z.array(blockHeaderDataSchema),
});

// /eth/v1/beacon/headers/{slot}
export const blockHeaderResponseSchema = z.object({
  data: blockHeaderDataSchema,
});

export type SignedHeaderSummary = z.infer<typeof signedBlockHeaderSchema>;
export type SidecarRecord = z.infer<typeof blobSidecarSchema>;

export type HttpResponse = {
  status: number;
  body: string;
};

/** Performs one GET. Throwing means the transport failed and the call may be retried. */
export type HttpGet = (url: string) => Promise<HttpResponse>;

export type BeaconClientConfig = {
  baseUrl: string;
  retryCount: number;
  retryDelayMs: number;
};

export type BeaconClientDeps = {
  httpGet?: HttpGet;
  sleep?: (ms: number) => Promise<void>;
};

export type BeaconClient = {
  getBlobSidecars: (slot: number) => Promise<SidecarRecord[]>;
  // '' when the slot has no header
  getBlockRoot: (slot: number) => Promise<string>;
  getHeadSlot: () => Promise<number>;
};

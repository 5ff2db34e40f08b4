import type { SidecarRecord } from '../beacon-client/types.js';
import type { BlockRoot } from '../shared/hex.js';

// The unit committed to storage, one per slot
export type SlotWriteRecord = {
  slot: number;
  root: BlockRoot;
  sidecars: SidecarRecord[];
};

// Inclusive on both ends
export type SlotRange = {
  fromSlot: number;
  toSlot: number;
  windowSize: number;
};

export type SlotWindow = {
  startSlot: number;
  endSlot: number;
};

export type WindowProgress = SlotWindow & {
  fromSlot: number;
  toSlot: number;
  percent: number;
  recordsWritten: number;
  sidecarsWritten: number;
};

export type ProgressReporter = (progress: WindowProgress) => void;

export type BackfillSummary = {
  windows: number;
  slots: number;
  sidecars: number;
};

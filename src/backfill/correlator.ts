import type { SidecarRecord } from '../beacon-client/types.js';
import { RootParseError } from '../shared/errors.js';
import { parseBlockRoot } from '../shared/hex.js';
import type { SlotWindow, SlotWriteRecord } from './types.js';

/**
 * Joins the window's roots and sidecar lists slot by slot.
 * Both arrays are indexed by offset from `window.startSlot`.
 */
export const correlateWindow = (
  window: SlotWindow,
  roots: readonly string[],
  sidecars: readonly SidecarRecord[][]
): SlotWriteRecord[] => {
  const slotCount = window.endSlot - window.startSlot + 1;
  if (roots.length !== slotCount || sidecars.length !== slotCount) {
    throw new Error(
      `window ${window.startSlot}..${window.endSlot} expects ${slotCount} results, got ${roots.length} roots and ${sidecars.length} sidecar lists`
    );
  }

  const records: SlotWriteRecord[] = [];
  for (let offset = 0; offset < slotCount; offset++) {
    const slot = window.startSlot + offset;
    const rootHex = roots[offset] ?? '';
    const root = parseBlockRoot(rootHex);
    if (!root.ok) {
      throw new RootParseError(slot, rootHex, root.error.message);
    }
    records.push({ slot, root: root.value, sidecars: sidecars[offset] ?? [] });
  }
  return records;
};

import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createJsonlSink, serializeRecord } from './jsonl-sink.js';
import type { SlotWriteRecord } from '../backfill/types.js';
import { EMPTY_BLOCK_ROOT, parseBlockRoot } from '../shared/hex.js';
import { makeSidecar, rootFor } from '../test-support/fixtures.js';

const recordFor = (slot: number, sidecarCount = 1): SlotWriteRecord => {
  const root = parseBlockRoot(rootFor(slot));
  if (!root.ok) throw root.error;
  return {
    slot,
    root: root.value,
    sidecars: Array.from({ length: sidecarCount }, (_, index) => makeSidecar(slot, index)),
  };
};

describe('createJsonlSink', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'blob-backfill-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('appends one newline-terminated line per slot across commits', async () => {
    const filePath = path.join(dir, 'nested', 'blobs-data.jsonl');
    const sink = await createJsonlSink(filePath);

    await sink.commit([recordFor(100), recordFor(101, 2)]);
    await sink.commit([{ slot: 102, root: EMPTY_BLOCK_ROOT, sidecars: [] }]);
    await sink.close();

    const content = await fs.readFile(filePath, 'utf8');
    expect(content.endsWith('\n')).toBe(true);
    const lines = content.split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[3]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual({ slot: 100, root: rootFor(100), data: [makeSidecar(100)] });
    expect(JSON.parse(lines[1] ?? '')).toEqual({
      slot: 101,
      root: rootFor(101),
      data: [makeSidecar(101, 0), makeSidecar(101, 1)],
    });
    expect(lines[2]).toBe('{"slot":102,"root":"","data":[]}');
  });

  it('keeps lines written by an earlier run', async () => {
    const filePath = path.join(dir, 'blobs-data.jsonl');
    await fs.writeFile(filePath, '{"slot":1,"root":"","data":[]}\n', 'utf8');

    const sink = await createJsonlSink(filePath);
    await sink.commit([{ slot: 2, root: EMPTY_BLOCK_ROOT, sidecars: [] }]);

    expect(await fs.readFile(filePath, 'utf8')).toBe(
      '{"slot":1,"root":"","data":[]}\n{"slot":2,"root":"","data":[]}\n'
    );
  });
});

describe('serializeRecord', () => {
  it('writes the root as hex next to the sidecars', () => {
    expect(JSON.parse(serializeRecord(recordFor(7)))).toMatchObject({ slot: 7, root: rootFor(7) });
  });
});

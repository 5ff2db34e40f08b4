import { describe, expect, it, vi } from 'vitest';
import { clampStartSlot, partitionWindows, planRange } from './range-planner.js';
import { InvalidRangeError } from '../shared/errors.js';

describe('clampStartSlot', () => {
  it('raises a start below the activation slot to the activation slot', () => {
    for (const start of [0, 1, 8626175]) {
      expect(clampStartSlot(start, 8626176)).toBe(8626176);
    }
  });

  it('keeps a start at or above the activation slot', () => {
    expect(clampStartSlot(8626176, 8626176)).toBe(8626176);
    expect(clampStartSlot(9000000, 8626176)).toBe(9000000);
  });
});

describe('planRange', () => {
  it('uses the given end slot without asking for the head', async () => {
    const getHeadSlot = vi.fn(async () => 999);
    const range = await planRange({ fromSlot: 100, toSlot: 200, activationSlot: 150, concurrency: 5 }, getHeadSlot);

    expect(range).toEqual({ fromSlot: 150, toSlot: 200, windowSize: 5 });
    expect(getHeadSlot).not.toHaveBeenCalled();
  });

  it('resolves an open end to the head slot', async () => {
    const range = await planRange({ fromSlot: 100, activationSlot: 0, concurrency: 20 }, async () => 500);

    expect(range).toEqual({ fromSlot: 100, toSlot: 500, windowSize: 20 });
  });

  it('propagates a head lookup failure', async () => {
    const failure = new Error('head lookup failed');
    await expect(
      planRange({ fromSlot: 100, activationSlot: 0, concurrency: 20 }, async () => { throw failure; })
    ).rejects.toBe(failure);
  });

  it('rejects an end slot before the effective start', async () => {
    await expect(
      planRange({ fromSlot: 0, toSlot: 100, activationSlot: 150, concurrency: 5 }, async () => 0)
    ).rejects.toBeInstanceOf(InvalidRangeError);
  });
});

describe('partitionWindows', () => {
  it('splits the range into windows and clamps the last one to the end', () => {
    expect([...partitionWindows({ fromSlot: 10, toSlot: 22, windowSize: 5 })]).toEqual([
      { startSlot: 10, endSlot: 14 },
      { startSlot: 15, endSlot: 19 },
      { startSlot: 20, endSlot: 22 },
    ]);
  });

  it('yields a single window for a one-slot range', () => {
    expect([...partitionWindows({ fromSlot: 7, toSlot: 7, windowSize: 5 })]).toEqual([{ startSlot: 7, endSlot: 7 }]);
  });

  it('covers an exact multiple of the window size without a trailing window', () => {
    expect([...partitionWindows({ fromSlot: 0, toSlot: 9, windowSize: 5 })]).toEqual([
      { startSlot: 0, endSlot: 4 },
      { startSlot: 5, endSlot: 9 },
    ]);
  });
});

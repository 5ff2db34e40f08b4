import { describe, expect, it } from 'vitest';
import { blockRootToHex, EMPTY_BLOCK_ROOT, isEmptyBlockRoot, isFixedHex, parseBlockRoot, parseFixedHex } from './hex.js';

const ROOT = '0x8f2c1a000000000000000000000000000000000000000000000000000000be01';

describe('parseBlockRoot', () => {
  it('round-trips a root through bytes and back to hex', () => {
    const parsed = parseBlockRoot(ROOT);
    expect(parsed.ok).toBe(true);
    if (!parsed.ok) return;
    expect(parsed.value).toHaveLength(32);
    expect(blockRootToHex(parsed.value)).toBe(ROOT);
  });

  it('maps the empty string to the empty sentinel', () => {
    const parsed = parseBlockRoot('');
    expect(parsed).toEqual({ ok: true, value: EMPTY_BLOCK_ROOT });
    if (!parsed.ok) return;
    expect(isEmptyBlockRoot(parsed.value)).toBe(true);
    expect(blockRootToHex(parsed.value)).toBe('');
  });

  it('rejects a root of the wrong length', () => {
    const parsed = parseBlockRoot('0xabcd');
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.message).toBe('expected 32 bytes, got 2');
  });

  it('rejects upper-case hex, which would not round-trip', () => {
    const parsed = parseBlockRoot('0x' + 'AB'.repeat(32));
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.message).toBe('not a 0x-prefixed lower-case hex string');
  });

  it('rejects a string that is not hex', () => {
    const parsed = parseBlockRoot('not-a-root');
    expect(parsed.ok).toBe(false);
    if (parsed.ok) return;
    expect(parsed.error.message).toBe('not a 0x-prefixed lower-case hex string');
  });
});

describe('isFixedHex', () => {
  it('checks both encoding and byte length', () => {
    expect(isFixedHex('0x' + 'ab'.repeat(48), 48)).toBe(true);
    expect(isFixedHex('0x' + 'ab'.repeat(47), 48)).toBe(false);
    expect(isFixedHex('ab'.repeat(48), 48)).toBe(false);
    expect(isFixedHex('0x' + 'zz'.repeat(48), 48)).toBe(false);
    expect(isFixedHex('0x' + 'AB'.repeat(48), 48)).toBe(false);
  });
});

describe('parseFixedHex', () => {
  it('decodes to exactly the requested number of bytes', () => {
    const parsed = parseFixedHex('0x0102', 2);
    expect(parsed).toEqual({ ok: true, value: new Uint8Array([1, 2]) });
  });
});

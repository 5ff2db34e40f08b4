import { describe, expect, it } from 'vitest';
import { buildProgram, parseCliArgs } from './options.js';

const quietProgram = () =>
  buildProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });

describe('parseCliArgs', () => {
  it('maps flags onto config overrides', () => {
    expect(
      parseCliArgs([
        '--api-url', 'http://localhost:5052',
        '-f', '8626176',
        '--to-slot', '8626200',
        '-c', '5',
        '--data-dir', './data',
        '--sink', 'jsonl',
        '--retry-delay-ms', '0',
      ])
    ).toEqual({
      apiUrl: 'http://localhost:5052',
      fromSlot: 8626176,
      toSlot: 8626200,
      concurrency: 5,
      dataDir: './data',
      sink: 'jsonl',
      retryDelayMs: 0,
    });
  });

  it('leaves unset flags undefined so the environment can fill them', () => {
    expect(parseCliArgs(['-f', '1'])).toEqual({ fromSlot: 1 });
  });

  it('rejects a slot that is not an integer', () => {
    expect(() => parseCliArgs(['-f', '12abc'], quietProgram())).toThrow("option '-f, --from-slot <slot>' argument '12abc' is invalid. Not a non-negative integer.");
  });

  it('rejects a zero concurrency', () => {
    expect(() => parseCliArgs(['-c', '0'], quietProgram())).toThrow('Must be greater than zero.');
  });

  it('rejects an unknown sink', () => {
    expect(() => parseCliArgs(['--sink', 'sqlite'], quietProgram())).toThrow(/Allowed choices are level, jsonl/);
  });
});

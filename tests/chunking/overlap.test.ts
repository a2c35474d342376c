/**
 * Unit Tests for overlap stitching
 */

import { describe, it, expect } from 'vitest';
import { TokenCounter, overlapUnits, stitchOverlap } from '../../lib/src/chunking/index.js';

const counter = new TokenCounter({ useTokenizer: false, charsPerToken: 1 });

const CHUNKS = [
  { body: '0123456789', annotated: 'A' },
  { body: 'abcdefghij', annotated: 'B' },
  { body: 'KLMNOPQRST', annotated: 'C' },
];

describe('overlapUnits', () => {
  it('should give each neighbour half the budget', () => {
    expect(overlapUnits(50)).toBe(25);
    expect(overlapUnits(51)).toBe(25);
    expect(overlapUnits(0)).toBe(0);
  });
});

describe('stitchOverlap', () => {
  it('should wrap each chunk with its neighbours bodies', () => {
    const stitched = stitchOverlap(CHUNKS, 8, counter);

    expect(stitched.map((s) => s.text)).toEqual([
      'A\n\nabcd [...]',
      '[...] 6789\n\nB\n\nKLMN [...]',
      '[...] ghij\n\nC',
    ]);
  });

  it('should flag which sides carry overlap', () => {
    const stitched = stitchOverlap(CHUNKS, 8, counter);

    expect(stitched.map((s) => [s.hasOverlapBefore, s.hasOverlapAfter])).toEqual([
      [false, true],
      [true, true],
      [true, false],
    ]);
  });

  it('should borrow bodies, never annotations', () => {
    const stitched = stitchOverlap(
      [
        { body: 'first body', annotated: 'REGISTER DEFINITION: X\n\nfirst body' },
        { body: 'second', annotated: 'second' },
      ],
      8,
      counter
    );
    expect(stitched[1]?.text).toBe('[...] body\n\nsecond');
  });

  it('should leave text untouched with no overlap budget', () => {
    const stitched = stitchOverlap(CHUNKS, 0, counter);
    expect(stitched.map((s) => s.text)).toEqual(['A', 'B', 'C']);
    expect(stitched.every((s) => !s.hasOverlapBefore && !s.hasOverlapAfter)).toBe(true);
  });

  it('should skip whitespace-only overlap', () => {
    const stitched = stitchOverlap(
      [
        { body: 'abc   ', annotated: 'abc   ' },
        { body: 'def', annotated: 'def' },
      ],
      6,
      counter
    );
    expect(stitched[1]).toEqual({ text: 'def', hasOverlapBefore: false, hasOverlapAfter: false });
  });

  it('should leave a single chunk alone', () => {
    expect(stitchOverlap([{ body: 'only', annotated: 'only' }], 10, counter)).toEqual([
      { text: 'only', hasOverlapBefore: false, hasOverlapAfter: false },
    ]);
  });
});

/**
 * Overlap Stitcher
 *
 * Gives each chunk boundary context from its neighbours in the document's
 * chunk sequence: the tail of the previous chunk's body before it and the
 * head of the next chunk's body after it, each marked with `[...]`.
 * Section boundaries do not stop overlap.
 */

import { formatLeadingOverlap, formatTrailingOverlap } from './annotation-format.js';
import type { TokenCounter } from './token-counter.js';

export interface StitchInput {
  /** Pre-annotation body; the only text neighbours borrow */
  body: string;
  /** Annotated text the overlap is wrapped around */
  annotated: string;
}

export interface StitchedText {
  text: string;
  hasOverlapBefore: boolean;
  hasOverlapAfter: boolean;
}

/**
 * Units each neighbour contributes: half the overlap budget
 */
export function overlapUnits(overlapBudget: number): number {
  return Math.max(0, Math.floor(overlapBudget / 2));
}

export function stitchOverlap(
  chunks: readonly StitchInput[],
  overlapBudget: number,
  counter: TokenCounter
): StitchedText[] {
  const units = overlapUnits(overlapBudget);

  return chunks.map((chunk, i) => {
    const parts: string[] = [];
    const previous = chunks[i - 1];
    const next = chunks[i + 1];

    const before = previous ? counter.tail(previous.body, units).trim() : '';
    if (before) {
      parts.push(formatLeadingOverlap(before));
    }
    parts.push(chunk.annotated);
    const after = next ? counter.head(next.body, units).trim() : '';
    if (after) {
      parts.push(formatTrailingOverlap(after));
    }

    return {
      text: parts.join('\n\n'),
      hasOverlapBefore: before.length > 0,
      hasOverlapAfter: after.length > 0,
    };
  });
}

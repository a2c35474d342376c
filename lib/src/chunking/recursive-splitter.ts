/**
 * Recursive Chunker
 *
 * Splits section text into unit-budgeted pieces at the coarsest natural
 * boundary available: paragraph, then line, then sentence, then word.
 * Pure and synchronous; no state survives a call.
 */

import type { TokenCounter } from './token-counter.js';
import type { Section } from './types.js';

// =============================================================================
// Boundaries
// =============================================================================

export interface Boundary {
  name: 'paragraph' | 'line' | 'sentence' | 'word';
  /** Matches the delimiter between two pieces; must carry the `g` flag */
  pattern: RegExp;
}

export const DEFAULT_BOUNDARIES: readonly Boundary[] = [
  { name: 'paragraph', pattern: /\n{2,}/g },
  { name: 'line', pattern: /\n/g },
  // Punctuation stays with the sentence it ends
  { name: 'sentence', pattern: /(?<=[.!?])\s+/g },
  { name: 'word', pattern: /\s/g },
];

interface Pieces {
  pieces: string[];
  /** delimiters[i] separated pieces[i] from pieces[i + 1] */
  delimiters: string[];
}

/**
 * Split on a boundary while remembering each delimiter, so accumulated
 * pieces are rejoined exactly as they appeared.
 */
export function splitOnBoundary(text: string, boundary: Boundary): Pieces {
  const pieces: string[] = [];
  const delimiters: string[] = [];
  const pattern = new RegExp(boundary.pattern.source, 'g');
  let last = 0;

  for (const match of text.matchAll(pattern)) {
    const index = match.index ?? 0;
    if (match[0].length === 0) continue;
    pieces.push(text.slice(last, index));
    delimiters.push(match[0]);
    last = index + match[0].length;
  }
  pieces.push(text.slice(last));

  return { pieces, delimiters };
}

// =============================================================================
// Splitting
// =============================================================================

export interface SplitResult {
  chunks: string[];
  /** Pieces longer than the budget with no boundary left to split on */
  oversized: string[];
}

/**
 * Split `text` into pieces of at most `budget` units.
 *
 * Whole text within budget is returned as one piece. Otherwise pieces at the
 * current boundary are accumulated greedily; a piece that alone exceeds the
 * budget is split again at the next boundary down. A run with no boundary
 * left is emitted whole and reported in `oversized`.
 */
export function splitRecursive(
  text: string,
  budget: number,
  counter: TokenCounter,
  boundaries: readonly Boundary[] = DEFAULT_BOUNDARIES
): SplitResult {
  const oversized: string[] = [];
  const chunks = splitInto(text, budget, counter, boundaries, oversized).filter(
    (chunk) => chunk.trim().length > 0
  );
  return { chunks, oversized };
}

function splitInto(
  text: string,
  budget: number,
  counter: TokenCounter,
  boundaries: readonly Boundary[],
  oversized: string[]
): string[] {
  const [boundary, ...rest] = boundaries;
  if (counter.fits(text, budget) || !boundary) {
    if (text.trim().length === 0) {
      return [];
    }
    if (!counter.fits(text, budget)) {
      oversized.push(text);
    }
    return [text];
  }

  const { pieces, delimiters } = splitOnBoundary(text, boundary);
  const chunks: string[] = [];
  let current = '';

  pieces.forEach((piece, i) => {
    const candidate = current ? `${current}${delimiters[i - 1] ?? ''}${piece}` : piece;
    if (counter.fits(candidate, budget)) {
      current = candidate;
      return;
    }
    if (current) {
      chunks.push(current);
    }
    if (counter.fits(piece, budget)) {
      current = piece;
    } else {
      chunks.push(...splitInto(piece, budget, counter, rest, oversized));
      current = '';
    }
  });

  if (current) {
    chunks.push(current);
  }
  return chunks;
}

// =============================================================================
// Sections
// =============================================================================

export interface SectionPieces {
  /** Chunk bodies, heading prefix included where one applies */
  bodies: string[];
  /** Unsplit section content and the budget it was split against */
  content: string;
  prefix: string;
  pieceBudget: number;
  oversized: string[];
}

export function headingPrefix(heading: string): string {
  return heading ? `# ${heading}\n\n` : '';
}

/**
 * Chunk one section's body.
 *
 * A section that fits (heading included, plus `reserve` units) becomes a single
 * chunk. Otherwise its content is split with the heading's cost taken off the
 * budget and the heading is prefixed to every piece. A heading that alone
 * exhausts the budget is not prefixed.
 */
export function chunkSectionBody(
  section: Section,
  budget: number,
  counter: TokenCounter,
  reserve: (body: string) => number = () => 0
): SectionPieces {
  const content = section.body.join('\n').trim();
  const empty: SectionPieces = { bodies: [], content, prefix: '', pieceBudget: budget, oversized: [] };
  if (!content) {
    return empty;
  }

  const fullPrefix = headingPrefix(section.heading);
  const whole = `${fullPrefix}${content}`;
  if (counter.count(whole) + reserve(whole) <= budget) {
    return { ...empty, bodies: [whole], prefix: fullPrefix };
  }

  const prefixCost = counter.count(fullPrefix);
  const prefix = prefixCost < budget ? fullPrefix : '';
  const pieceBudget = prefix ? budget - prefixCost : budget;
  const { chunks, oversized } = splitRecursive(content, pieceBudget, counter);

  return {
    bodies: chunks.map((chunk) => `${prefix}${chunk}`),
    content,
    prefix,
    pieceBudget,
    oversized,
  };
}

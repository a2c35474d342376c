/**
 * Text Normalizer
 *
 * Strips page furniture (running headers, footers, page numbers) and layout
 * whitespace from extracted text before it is split into sections.
 */

import type { ChunkingConfig } from '../config/types.js';
import { DEFAULT_HEADER_PATTERNS } from '../config/types.js';
import type { PageText } from './types.js';

export type NormalizeOptions = Pick<
  ChunkingConfig,
  'headerPatterns' | 'headerMaxLength' | 'headerMinRepeats'
>;

const DEFAULT_OPTIONS: NormalizeOptions = {
  headerPatterns: [...DEFAULT_HEADER_PATTERNS],
  headerMaxLength: 80,
  headerMinRepeats: 3,
};

// =============================================================================
// Running header detection
// =============================================================================

/**
 * Line with digit runs masked, so "Page 3 of 40" and "Page 4 of 40" collide
 */
export function lineSignature(line: string): string {
  return line.trim().replace(/\d+/g, '#').replace(/\s+/g, ' ');
}

const PAGE_NUMBER_TOKEN = /(?:^|\s)\d+(?:\s*(?:\/|of)\s*\d+)?(?:\s|$)/i;

/**
 * Short line carrying a standalone page number. Labelled fields
 * (`Address offset: 0x04`) and table rows never qualify.
 */
function isHeaderCandidate(line: string, maxLength: number): boolean {
  const trimmed = line.trim();
  return (
    trimmed.length > 0 &&
    trimmed.length <= maxLength &&
    !trimmed.includes(':') &&
    !trimmed.startsWith('|') &&
    !trimmed.startsWith('#') &&
    PAGE_NUMBER_TOKEN.test(trimmed)
  );
}

/**
 * Signatures of short digit-bearing lines repeated often enough to be page furniture
 */
export function findRunningHeaders(lines: readonly string[], options: NormalizeOptions): Set<string> {
  const counts = new Map<string, number>();
  for (const line of lines) {
    if (isHeaderCandidate(line, options.headerMaxLength)) {
      const signature = lineSignature(line);
      counts.set(signature, (counts.get(signature) ?? 0) + 1);
    }
  }

  const repeated = new Set<string>();
  for (const [signature, count] of counts) {
    if (count >= options.headerMinRepeats) {
      repeated.add(signature);
    }
  }
  return repeated;
}

function compilePatterns(sources: readonly string[]): RegExp[] {
  return sources.map((source) => new RegExp(source));
}

function isFurniture(
  line: string,
  patterns: readonly RegExp[],
  repeated: ReadonlySet<string>,
  maxLength: number
): boolean {
  const trimmed = line.trim();
  if (patterns.some((pattern) => pattern.test(trimmed))) {
    return true;
  }
  return isHeaderCandidate(line, maxLength) && repeated.has(lineSignature(line));
}

// =============================================================================
// Whitespace
// =============================================================================

export function collapseWhitespace(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/[ \t]+$/gm, '')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

function cleanLines(
  lines: readonly string[],
  patterns: readonly RegExp[],
  repeated: ReadonlySet<string>,
  maxLength: number
): string {
  const kept = lines.filter((line) => !isFurniture(line, patterns, repeated, maxLength));
  return collapseWhitespace(kept.join('\n'));
}

function splitLines(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').split('\n');
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Normalize one document's text.
 *
 * @example
 * ```typescript
 * normalizeText('Intro\n\n\n\n12/709 RM0008 Rev 21\nBody   ');
 * // => 'Intro\n\nBody'
 * ```
 */
export function normalizeText(text: string, options: Partial<NormalizeOptions> = {}): string {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const lines = splitLines(text);
  const repeated = findRunningHeaders(lines, opts);
  return cleanLines(lines, compilePatterns(opts.headerPatterns), repeated, opts.headerMaxLength);
}

/**
 * Normalize page-scoped text. Repetition is counted across all pages, so a
 * footer printed once per page is recognised even though each page holds it once.
 */
export function normalizePages(
  pages: readonly PageText[],
  options: Partial<NormalizeOptions> = {}
): PageText[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const pageLines = pages.map((page) => splitLines(page.text));
  const repeated = findRunningHeaders(pageLines.flat(), opts);
  const patterns = compilePatterns(opts.headerPatterns);

  return pages.map((page, i) => ({
    pageNumber: page.pageNumber,
    text: cleanLines(pageLines[i] ?? [], patterns, repeated, opts.headerMaxLength),
  }));
}

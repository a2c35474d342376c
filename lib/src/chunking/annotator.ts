/**
 * Structural Classifier / Annotator
 *
 * Classifies each chunk as a register definition, a register overview or
 * regular text, and synthesizes the title and key-term line that the
 * keyword boost later matches query identifiers against.
 *
 * Rules are evaluated in order and are mutually exclusive:
 * 1. register definition: tabular structure plus an `Address offset:` line
 * 2. overview: at least `overviewMinIdentifiers` distinct register identifiers
 * 3. regular: everything else
 */

import type { ChunkingConfig } from '../config/types.js';
import {
  OVERVIEW_MARKER,
  TABLE_MARKER,
  findRegisterIdentifiers,
  formatKeyTerms,
  formatTitle,
  renderAnnotatedText,
} from './annotation-format.js';
import { ChunkKind } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface Annotation {
  kind: ChunkKind;
  title?: string;
  /** Rendered `[KEY: …]` line */
  keyTerms?: string;
  keyTermList: string[];
  /** Register name used in the title, for register definitions */
  registerName?: string;
}

export interface AnnotationContext {
  /** Heading of the section the chunk came from */
  sectionHeading?: string;
}

export type AnnotatorOptions = Pick<
  ChunkingConfig,
  'overviewMinIdentifiers' | 'maxKeyIdentifiers' | 'maxFieldTerms'
>;

const DEFAULT_OPTIONS: AnnotatorOptions = {
  overviewMinIdentifiers: 4,
  maxKeyIdentifiers: 5,
  maxFieldTerms: 8,
};

// =============================================================================
// Detectors
// =============================================================================

const MARKDOWN_TABLE_SEPARATOR = /^\s*\|?\s*:?-+:?\s*(\|\s*:?-+:?\s*)+\|?\s*$/m;
const ADDRESS_OFFSET = /Address offset:\s*(0x[0-9A-Fa-f]+|\d+)/i;
const RESET_VALUE = /Reset value:\s*(0x[0-9A-Fa-f]+|\d+)/i;
const BIT_FIELD = /Bits?\s+\d+(?::\d+)?\s+([A-Z][A-Z0-9_]*)(?:\[\d+(?::\d+)?\])?:/g;

function delimiterCount(line: string): number {
  return line.split('|').length - 1;
}

/**
 * A markdown separator row, or three consecutive lines with the same number
 * (two or more) of `|` delimiters.
 */
export function hasTabularStructure(text: string): boolean {
  if (MARKDOWN_TABLE_SEPARATOR.test(text)) {
    return true;
  }

  let run = 0;
  let previous = -1;
  for (const line of text.split('\n')) {
    const count = delimiterCount(line);
    if (count >= 2 && count === previous) {
      run++;
    } else {
      run = count >= 2 ? 1 : 0;
    }
    if (run >= 3) {
      return true;
    }
    previous = count;
  }
  return false;
}

export function findAddressOffset(text: string): { value: string; index: number } | null {
  const match = ADDRESS_OFFSET.exec(text);
  return match?.[1] ? { value: match[1], index: match.index } : null;
}

export function findResetValue(text: string): string | null {
  return RESET_VALUE.exec(text)?.[1] ?? null;
}

export function findBitFieldNames(text: string, limit: number): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(BIT_FIELD)) {
    if (match[1]) {
      names.add(match[1]);
    }
  }
  return [...names].slice(0, limit);
}

/**
 * Register name for a definition title: the nearest heading line above the
 * offset that names a register, then the section heading, then the first
 * identifier anywhere in the chunk.
 */
export function resolveRegisterName(
  text: string,
  offsetIndex: number,
  sectionHeading = ''
): string {
  const headingLines = text
    .slice(0, offsetIndex)
    .split('\n')
    .filter((line) => line.trimStart().startsWith('#'))
    .reverse();

  for (const line of headingLines) {
    const [identifier] = findRegisterIdentifiers(line);
    if (identifier) {
      return identifier;
    }
  }

  const [fromSection] = findRegisterIdentifiers(sectionHeading);
  if (fromSection) {
    return fromSection;
  }
  const [fromText] = findRegisterIdentifiers(text);
  if (fromText) {
    return fromText;
  }
  return sectionHeading.trim() || 'UNKNOWN';
}

// =============================================================================
// Classification
// =============================================================================

/**
 * Classify a chunk body and build its annotation
 */
export function classifyChunk(
  body: string,
  context: AnnotationContext = {},
  options: Partial<AnnotatorOptions> = {}
): Annotation {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const identifiers = findRegisterIdentifiers(body);
  const offset = findAddressOffset(body);
  const reset = findResetValue(body);

  if (offset && hasTabularStructure(body)) {
    const registerName = resolveRegisterName(body, offset.index, context.sectionHeading);
    const terms = [TABLE_MARKER, registerName, `offset:${offset.value}`];
    if (reset) {
      terms.push(`reset:${reset}`);
    }
    const fields = findBitFieldNames(body, opts.maxFieldTerms);
    if (fields.length > 0) {
      terms.push(`fields:${fields.join(',')}`);
    }
    return {
      kind: ChunkKind.REGISTER_DEFINITION,
      title: formatTitle(registerName),
      keyTerms: formatKeyTerms(terms),
      keyTermList: terms,
      registerName,
    };
  }

  if (identifiers.length >= opts.overviewMinIdentifiers) {
    // Register names stay out so this chunk never wins an exact-name match
    return {
      kind: ChunkKind.OVERVIEW,
      keyTerms: formatKeyTerms([OVERVIEW_MARKER]),
      keyTermList: [OVERVIEW_MARKER],
    };
  }

  const terms = identifiers.slice(0, opts.maxKeyIdentifiers);
  if (offset) {
    terms.push(`offset:${offset.value}`);
  }
  if (reset) {
    terms.push(`reset:${reset}`);
  }
  return {
    kind: ChunkKind.REGULAR,
    ...(terms.length > 0 ? { keyTerms: formatKeyTerms(terms) } : {}),
    keyTermList: terms,
  };
}

/**
 * Annotated text for a body: title, key-term line, then the body
 */
export function annotate(body: string, annotation: Annotation): string {
  return renderAnnotatedText(body, annotation.title, annotation.keyTerms);
}

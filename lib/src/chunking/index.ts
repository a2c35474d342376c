/**
 * Chunking Module
 *
 * Structure-aware chunking for register-heavy technical documents.
 * Normalizes extracted text, splits it into heading- or page-scoped
 * sections, drops table-of-contents noise, chunks each section at natural
 * boundaries under a unit budget, annotates register definitions and
 * overviews, and stitches boundary overlap between neighbours.
 *
 * @example
 * ```typescript
 * import { chunkDocument, TokenCounter } from '@techdoc-rag/lib';
 *
 * const counter = new TokenCounter();
 * await counter.initializeTokenizer(); // Optional - enables exact counting
 *
 * const result = chunkDocument({
 *   documentId: 'rm0008',
 *   source: 'rm0008.md',
 *   document: { kind: 'text', text: markdown },
 *   config: { chunkSize: 400, chunkOverlap: 40 },
 *   counter,
 * });
 *
 * for (const chunk of result.chunks) {
 *   console.log(`${chunk.id} [${chunk.kind}] ${chunk.unitCount} units`);
 *   if (chunk.title) console.log(chunk.title);
 * }
 *
 * // Read annotations back out of stored text
 * const { title, keyTerms, body } = parseAnnotatedRegions(result.chunks[0].text);
 * ```
 */

// Types and Schemas
export {
  ChunkKind,
  ChunkKindSchema,
  PageTextSchema,
  ChunkSchema,
  ChunkingStatsSchema,
  generateChunkId,
  parseChunkId,
  createSectionPath,
} from './types.js';
export type {
  PageText,
  DocumentText,
  Section,
  Chunk,
  ChunkingStats,
  ChunkingResult,
} from './types.js';

// Token Counting
export {
  TokenCounter,
  getGlobalTokenCounter,
  resetGlobalTokenCounter,
  countTokens,
} from './token-counter.js';
export type { TokenizerInterface, TokenCounterConfig, TokenCountMethod } from './token-counter.js';

// Annotation Format
export {
  REGISTER_IDENTIFIER_SOURCE,
  registerIdentifierPattern,
  findRegisterIdentifiers,
  TITLE_PREFIX,
  TITLE_SUFFIX,
  KEY_PREFIX,
  KEY_SEPARATOR,
  TABLE_MARKER,
  OVERVIEW_MARKER,
  OVERLAP_MARKER,
  formatTitle,
  formatKeyTerms,
  renderAnnotatedText,
  formatLeadingOverlap,
  formatTrailingOverlap,
  parseAnnotatedRegions,
} from './annotation-format.js';
export type { AnnotatedRegions } from './annotation-format.js';

// Pipeline Stages
export {
  normalizeText,
  normalizePages,
  collapseWhitespace,
  findRunningHeaders,
  lineSignature,
} from './normalizer.js';
export type { NormalizeOptions } from './normalizer.js';

export { splitSections, splitPages, sectionContent } from './section-splitter.js';

export { stripTocArtifacts, isTableOfContents, filterTableOfContents } from './toc-filter.js';
export type { TocFilterResult } from './toc-filter.js';

export {
  DEFAULT_BOUNDARIES,
  splitOnBoundary,
  splitRecursive,
  headingPrefix,
  chunkSectionBody,
} from './recursive-splitter.js';
export type { Boundary, SplitResult, SectionPieces } from './recursive-splitter.js';

export {
  hasTabularStructure,
  findAddressOffset,
  findResetValue,
  findBitFieldNames,
  resolveRegisterName,
  classifyChunk,
  annotate,
} from './annotator.js';
export type { Annotation, AnnotationContext, AnnotatorOptions } from './annotator.js';

export { overlapUnits, stitchOverlap } from './overlap.js';
export type { StitchInput, StitchedText } from './overlap.js';

// Document Chunker
export { chunkDocument } from './chunker.js';
export type { ChunkDocumentInput } from './chunker.js';

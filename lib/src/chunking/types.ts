/**
 * Chunking Types and Schemas
 *
 * Sections, chunks and chunking results for register-heavy technical
 * documents (reference manuals, datasheets, programming guides).
 */

import { z } from 'zod';

// =============================================================================
// Chunk Classification
// =============================================================================

/**
 * Structural classification assigned by the annotator
 */
export const ChunkKind = {
  /** Ordinary prose or tables */
  REGULAR: 'regular',
  /** A register's bit-field table with its address offset */
  REGISTER_DEFINITION: 'register_definition',
  /** A summary listing many registers (register maps, peripheral overviews) */
  OVERVIEW: 'overview',
} as const;

export type ChunkKind = (typeof ChunkKind)[keyof typeof ChunkKind];

export const ChunkKindSchema = z.enum(['regular', 'register_definition', 'overview']);

// =============================================================================
// Document Input
// =============================================================================

export const PageTextSchema = z.object({
  /** 1-based physical page number */
  pageNumber: z.number().int().positive(),
  text: z.string(),
});

export type PageText = z.infer<typeof PageTextSchema>;

/**
 * Raw text handed to the chunker: heading-structured text (Markdown, plain
 * text) or page-scoped text (PDF).
 */
export type DocumentText =
  | { kind: 'text'; text: string }
  | { kind: 'pages'; pages: PageText[] };

// =============================================================================
// Sections
// =============================================================================

/**
 * Heading- or page-scoped run of body lines. Frozen once produced.
 */
export interface Section {
  readonly documentId: string;
  /** Heading text without markers; empty for a preamble or a page */
  readonly heading: string;
  /** Heading depth 1-4; 0 for preamble and page sections */
  readonly level: number;
  readonly body: readonly string[];
  /** Set for page-scoped sources */
  readonly pageNumber?: number;
  /** Set for heading-scoped sources, e.g. "9 GPIO > 9.4 AFIO registers" */
  readonly sectionPath?: string;
}

// =============================================================================
// Chunks
// =============================================================================

export const ChunkSchema = z.object({
  /** Deterministic id: `${documentId}_chunk_${chunkIndex}` */
  id: z.string().min(1),
  documentId: z.string().min(1),
  /** Position in the document's chunk sequence */
  chunkIndex: z.number().int().nonnegative(),
  /** Position among the chunks of its section */
  positionInSection: z.number().int().nonnegative(),
  kind: ChunkKindSchema,
  /** Pre-annotation text (heading prefix included) */
  body: z.string().min(1),
  title: z.string().optional(),
  /** Rendered key-term line, e.g. `[KEY: AFIO_MAPR | offset:0x04]` */
  keyTerms: z.string().optional(),
  keyTermList: z.array(z.string()),
  /** Final text: overlap + annotation + body */
  text: z.string().min(1),
  /** Units of the annotated text before overlap */
  unitCount: z.number().int().nonnegative(),
  hasOverlapBefore: z.boolean(),
  hasOverlapAfter: z.boolean(),
  /** File name or other display name of the source */
  source: z.string().min(1),
  page: z.number().int().positive().optional(),
  /** Section heading, truncated to 100 characters */
  section: z.string().optional(),
  sectionPath: z.string().optional(),
  metadata: z.record(z.string()),
});

export type Chunk = z.infer<typeof ChunkSchema>;

// =============================================================================
// Results
// =============================================================================

export const ChunkingStatsSchema = z.object({
  sectionsFound: z.number().int().nonnegative(),
  sectionsDropped: z.number().int().nonnegative(),
  chunkCount: z.number().int().nonnegative(),
  registerDefinitions: z.number().int().nonnegative(),
  overviews: z.number().int().nonnegative(),
  /** Chunks that could not be brought under budget */
  oversizedChunks: z.number().int().nonnegative(),
  maxUnitCount: z.number().int().nonnegative(),
  durationMs: z.number().nonnegative(),
});

export type ChunkingStats = z.infer<typeof ChunkingStatsSchema>;

export interface ChunkingResult {
  documentId: string;
  chunks: Chunk[];
  stats: ChunkingStats;
  warnings: string[];
}

// =============================================================================
// Utility Functions
// =============================================================================

export function generateChunkId(documentId: string, chunkIndex: number): string {
  return `${documentId}_chunk_${chunkIndex}`;
}

export function parseChunkId(chunkId: string): { documentId: string; chunkIndex: number } | null {
  const match = /^(.+)_chunk_(\d+)$/.exec(chunkId);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { documentId: match[1], chunkIndex: parseInt(match[2], 10) };
}

export function createSectionPath(headings: readonly string[]): string {
  return headings.filter((h) => h.length > 0).join(' > ');
}

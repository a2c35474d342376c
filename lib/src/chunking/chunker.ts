/**
 * Document Chunker
 *
 * Runs the ingestion-side pipeline for one document:
 * normalize → split sections → drop TOC sections → chunk each section →
 * classify and annotate → stitch overlap.
 */

import { createDefaultChunkingConfig, type ChunkingConfig } from '../config/types.js';
import { type Logger, resolveLogger } from '../logging/logger.js';
import { annotate, classifyChunk, type Annotation } from './annotator.js';
import { normalizePages, normalizeText } from './normalizer.js';
import { stitchOverlap } from './overlap.js';
import { chunkSectionBody, splitRecursive } from './recursive-splitter.js';
import { splitPages, splitSections } from './section-splitter.js';
import { getGlobalTokenCounter, type TokenCounter } from './token-counter.js';
import { filterTableOfContents } from './toc-filter.js';
import {
  ChunkKind,
  generateChunkId,
  type Chunk,
  type ChunkingResult,
  type DocumentText,
  type Section,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ChunkDocumentInput {
  documentId: string;
  /** Display name stored with every chunk, usually the file name */
  source: string;
  document: DocumentText;
  /** User metadata copied onto every chunk */
  metadata?: Record<string, string>;
  config?: Partial<ChunkingConfig>;
  counter?: TokenCounter;
  logger?: Logger;
}

interface DraftChunk {
  section: Section;
  positionInSection: number;
  body: string;
  annotation: Annotation;
  annotated: string;
  unitCount: number;
}

interface SectionContext {
  section: Section;
  config: ChunkingConfig;
  counter: TokenCounter;
}

const SECTION_LABEL_LENGTH = 100;

// =============================================================================
// Main Chunking Function
// =============================================================================

/**
 * Chunk one document into annotated, overlapped chunks ready for embedding.
 *
 * @example
 * ```typescript
 * const result = chunkDocument({
 *   documentId: 'rm0008',
 *   source: 'rm0008.md',
 *   document: { kind: 'text', text: markdown },
 *   metadata: { vendor: 'st' },
 * });
 *
 * for (const chunk of result.chunks) {
 *   console.log(chunk.kind, chunk.title ?? chunk.section);
 * }
 * ```
 */
export function chunkDocument(input: ChunkDocumentInput): ChunkingResult {
  const startTime = performance.now();
  const config = createDefaultChunkingConfig(input.config);
  const counter = input.counter ?? getGlobalTokenCounter();
  const logger = resolveLogger('chunker', input.logger);
  const warnings: string[] = [];

  const sections = toSections(input.documentId, input.document, config);
  const { kept, dropped } = filterTableOfContents(sections, config.tocMinChars);
  if (dropped.length > 0) {
    logger.debug('Dropped table-of-contents sections', {
      documentId: input.documentId,
      count: dropped.length,
    });
  }

  const drafts: DraftChunk[] = [];
  let oversizedChunks = 0;
  for (const section of kept) {
    const sectionDrafts = chunkSection({ section, config, counter });
    for (const draft of sectionDrafts) {
      if (draft.unitCount > config.chunkSize) {
        oversizedChunks++;
        const message =
          `Chunk ${drafts.length} of "${input.documentId}" is ${draft.unitCount} units, ` +
          `over the ${config.chunkSize}-unit budget with no boundary left to split on`;
        warnings.push(message);
        logger.warn(message, { section: describeSection(section) });
      }
      drafts.push(draft);
    }
  }

  const stitched = stitchOverlap(
    drafts.map((d) => ({ body: d.body, annotated: d.annotated })),
    config.chunkOverlap,
    counter
  );

  const chunks = drafts.map((draft, chunkIndex): Chunk => {
    const overlap = stitched[chunkIndex];
    return buildChunk(input, draft, chunkIndex, overlap?.text ?? draft.annotated, {
      before: overlap?.hasOverlapBefore ?? false,
      after: overlap?.hasOverlapAfter ?? false,
    });
  });

  const stats = {
    sectionsFound: sections.length,
    sectionsDropped: dropped.length,
    chunkCount: chunks.length,
    registerDefinitions: chunks.filter((c) => c.kind === ChunkKind.REGISTER_DEFINITION).length,
    overviews: chunks.filter((c) => c.kind === ChunkKind.OVERVIEW).length,
    oversizedChunks,
    maxUnitCount: chunks.reduce((max, c) => Math.max(max, c.unitCount), 0),
    durationMs: performance.now() - startTime,
  };

  logger.debug('Chunked document', {
    documentId: input.documentId,
    sections: stats.sectionsFound,
    chunks: stats.chunkCount,
    registerDefinitions: stats.registerDefinitions,
  });

  return { documentId: input.documentId, chunks, stats, warnings };
}

// =============================================================================
// Internal Functions
// =============================================================================

function toSections(documentId: string, document: DocumentText, config: ChunkingConfig): Section[] {
  if (document.kind === 'pages') {
    return splitPages(normalizePages(document.pages, config), documentId);
  }
  return splitSections(normalizeText(document.text, config), documentId);
}

function describeSection(section: Section): string {
  if (section.pageNumber !== undefined) {
    return `page ${section.pageNumber}`;
  }
  return section.heading || '(preamble)';
}

type AnnotatedBody = Omit<DraftChunk, 'positionInSection' | 'section'>;

function annotateBody(body: string, ctx: SectionContext): AnnotatedBody {
  const annotation = classifyChunk(body, { sectionHeading: ctx.section.heading }, ctx.config);
  const annotated = annotate(body, annotation);
  return { body, annotation, annotated, unitCount: ctx.counter.count(annotated) };
}

function chunkSection(ctx: SectionContext): DraftChunk[] {
  const { section, config, counter } = ctx;
  const budget = config.chunkSize;

  const pieces = chunkSectionBody(section, budget, counter, (whole) => {
    return annotateBody(whole, ctx).unitCount - counter.count(whole);
  });

  const annotated = pieces.bodies.flatMap((body) =>
    fitAnnotated(annotateBody(body, ctx), pieces.prefix, pieces.pieceBudget, ctx)
  );

  return annotated.map((draft, positionInSection) => ({ ...draft, section, positionInSection }));
}

/**
 * A body that fits on its own but not once its title and key terms are
 * added is split again with the annotation's cost reserved. Each resulting
 * piece is classified on its own, so its annotation can be longer than the
 * whole body's; pieces still over budget are split again against their own
 * cost until they fit or cannot be split further.
 */
function fitAnnotated(
  draft: AnnotatedBody,
  prefix: string,
  pieceBudget: number,
  ctx: SectionContext
): AnnotatedBody[] {
  const budget = ctx.config.chunkSize;
  if (draft.unitCount <= budget || !ctx.counter.fits(draft.body, budget)) {
    return [draft];
  }

  const overhead = draft.unitCount - ctx.counter.count(draft.body);
  const reduced = pieceBudget - overhead;
  if (reduced < 1) {
    return [draft];
  }

  const raw = draft.body.startsWith(prefix) ? draft.body.slice(prefix.length) : draft.body;
  const { chunks } = splitRecursive(raw, reduced, ctx.counter);
  if (chunks.length <= 1) {
    return [draft];
  }
  return chunks.flatMap((piece) => fitAnnotated(annotateBody(`${prefix}${piece}`, ctx), prefix, pieceBudget, ctx));
}

function buildChunk(
  input: ChunkDocumentInput,
  draft: DraftChunk,
  chunkIndex: number,
  text: string,
  overlap: { before: boolean; after: boolean }
): Chunk {
  const { section, annotation } = draft;
  return {
    id: generateChunkId(input.documentId, chunkIndex),
    documentId: input.documentId,
    chunkIndex,
    positionInSection: draft.positionInSection,
    kind: annotation.kind,
    body: draft.body,
    ...(annotation.title ? { title: annotation.title } : {}),
    ...(annotation.keyTerms ? { keyTerms: annotation.keyTerms } : {}),
    keyTermList: [...annotation.keyTermList],
    text,
    unitCount: draft.unitCount,
    hasOverlapBefore: overlap.before,
    hasOverlapAfter: overlap.after,
    source: input.source,
    ...(section.pageNumber !== undefined ? { page: section.pageNumber } : {}),
    ...(section.heading ? { section: section.heading.slice(0, SECTION_LABEL_LENGTH) } : {}),
    ...(section.sectionPath ? { sectionPath: section.sectionPath } : {}),
    metadata: { ...input.metadata },
  };
}

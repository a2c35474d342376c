/**
 * Unit Tests for the document chunker
 *
 * Counting is one unit per character so budgets can be traced by hand.
 */

import { describe, it, expect } from 'vitest';
import {
  ChunkKind,
  ChunkSchema,
  TokenCounter,
  chunkDocument,
  parseAnnotatedRegions,
} from '../../lib/src/chunking/index.js';
import { Logger } from '../../lib/src/logging/index.js';

const counter = new TokenCounter({ useTokenizer: false, charsPerToken: 1 });

const MANUAL = [
  '# Contents',
  'Clock tree ........ 91',
  'AFIO registers ....... 180',
  '',
  '## 9.4.2 AF remap register (AFIO_MAPR)',
  'Address offset: 0x04',
  'Reset value: 0x0000 0000',
  '| Bits | Field |',
  '|------|-------|',
  '| 26:24 | SWJ_CFG |',
  'Bits 26:24 SWJ_CFG[2:0]: Serial wire JTAG configuration',
  '',
  '## 9.5 Overview',
  'The AFIO block holds AFIO_EVCR, AFIO_MAPR, AFIO_EXTICR1 and AFIO_EXTICR2 registers in its map.',
].join('\n');

function silentLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = new Logger({
    timestamps: false,
    output: (line) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

describe('chunkDocument', () => {
  describe('markdown manuals', () => {
    const { logger } = silentLogger();
    const result = chunkDocument({
      documentId: 'rm0008',
      source: 'rm0008.md',
      document: { kind: 'text', text: MANUAL },
      metadata: { vendor: 'st' },
      config: { chunkOverlap: 0 },
      counter,
      logger,
    });

    it('should drop the table of contents', () => {
      expect(result.stats.sectionsFound).toBe(3);
      expect(result.stats.sectionsDropped).toBe(1);
      expect(result.chunks.some((c) => c.body.includes('Clock tree'))).toBe(false);
    });

    it('should produce exactly one register definition for the bit-field table', () => {
      const definitions = result.chunks.filter((c) => c.kind === ChunkKind.REGISTER_DEFINITION);

      expect(definitions).toHaveLength(1);
      expect(definitions[0]?.title).toBe(
        'REGISTER DEFINITION: AFIO_MAPR - Complete bit field specification'
      );
      expect(definitions[0]?.keyTerms).toBe(
        '[KEY: TABLE:register_bitfields | AFIO_MAPR | offset:0x04 | reset:0x0000 | fields:SWJ_CFG]'
      );
    });

    it('should classify the register list as an overview', () => {
      expect(result.chunks.map((c) => c.kind)).toEqual([
        ChunkKind.REGISTER_DEFINITION,
        ChunkKind.OVERVIEW,
      ]);
      expect(result.stats.registerDefinitions).toBe(1);
      expect(result.stats.overviews).toBe(1);
    });

    it('should prefix the section heading to the body', () => {
      expect(result.chunks[0]?.body.startsWith('# 9.4.2 AF remap register (AFIO_MAPR)\n\nAddress offset: 0x04')).toBe(true);
    });

    it('should write annotations the keyword boost can read back', () => {
      const chunk = result.chunks[0];
      const regions = parseAnnotatedRegions(chunk?.text ?? '');

      expect(regions.title).toBe(chunk?.title);
      expect(regions.keyTerms).toBe(chunk?.keyTerms);
    });

    it('should assign deterministic ids and section metadata', () => {
      const [first, second] = result.chunks;

      expect(first?.id).toBe('rm0008_chunk_0');
      expect(second?.id).toBe('rm0008_chunk_1');
      expect(first?.chunkIndex).toBe(0);
      expect(first?.section).toBe('9.4.2 AF remap register (AFIO_MAPR)');
      expect(first?.sectionPath).toBe('Contents > 9.4.2 AF remap register (AFIO_MAPR)');
      expect(first?.page).toBeUndefined();
      expect(first?.source).toBe('rm0008.md');
      expect(first?.metadata).toEqual({ vendor: 'st' });
    });

    it('should produce chunks that satisfy the chunk schema', () => {
      for (const chunk of result.chunks) {
        expect(ChunkSchema.safeParse(chunk).success).toBe(true);
      }
    });
  });

  describe('budget', () => {
    const paragraphs = Array.from(
      { length: 12 },
      () => 'The counter reloads from the preload register. Set TIM1_CCR2 before enabling it.'
    ).join('\n\n');

    it('should keep every annotated chunk within the budget', () => {
      const result = chunkDocument({
        documentId: 'tim',
        source: 'tim.txt',
        document: { kind: 'text', text: paragraphs },
        config: { chunkSize: 60, chunkOverlap: 10 },
        counter,
      });

      expect(result.chunks.length).toBeGreaterThan(1);
      expect(result.stats.oversizedChunks).toBe(0);
      for (const chunk of result.chunks) {
        expect(chunk.unitCount).toBeLessThanOrEqual(60);
      }
      expect(result.stats.maxUnitCount).toBeLessThanOrEqual(60);
    });

    it('should split again when the annotation pushes a body over budget', () => {
      const result = chunkDocument({
        documentId: 'afio',
        source: 'afio.txt',
        document: { kind: 'text', text: 'AFIO_MAPR controls remap bits' },
        config: { chunkSize: 40, chunkOverlap: 0, tocMinChars: 0 },
        counter,
      });

      expect(result.chunks.map((c) => c.body)).toEqual(['AFIO_MAPR controls', 'remap bits']);
      expect(result.chunks.map((c) => c.text)).toEqual([
        '[KEY: AFIO_MAPR]\n\nAFIO_MAPR controls',
        'remap bits',
      ]);
      expect(result.chunks.map((c) => c.positionInSection)).toEqual([0, 1]);
      expect(result.chunks.map((c) => c.unitCount)).toEqual([36, 10]);
    });

    it('should split again when a piece of an overview gets a longer key-term line', () => {
      const { logger, lines } = silentLogger();
      const result = chunkDocument({
        documentId: 'regs',
        source: 'regs.txt',
        document: { kind: 'text', text: 'ABCD_EFG1 ABCD_EFG2 ABCD_EFG3\n\nABCD_EFG4 x' },
        config: { chunkSize: 60, chunkOverlap: 0, tocMinChars: 0 },
        counter,
        logger,
      });

      expect(result.chunks.map((c) => c.body)).toEqual(['ABCD_EFG1', 'ABCD_EFG2', 'ABCD_EFG3', 'ABCD_EFG4 x']);
      expect(result.chunks.map((c) => c.kind)).toEqual([
        ChunkKind.REGULAR,
        ChunkKind.REGULAR,
        ChunkKind.REGULAR,
        ChunkKind.REGULAR,
      ]);
      expect(result.chunks[0]?.text).toBe('[KEY: ABCD_EFG1]\n\nABCD_EFG1');
      expect(result.chunks.map((c) => c.unitCount)).toEqual([27, 27, 27, 29]);
      expect(result.stats.oversizedChunks).toBe(0);
      expect(result.warnings).toEqual([]);
      expect(lines).toEqual([]);
    });

    it('should warn when the annotation alone leaves no room to split', () => {
      const result = chunkDocument({
        documentId: 'afio',
        source: 'afio.txt',
        document: { kind: 'text', text: 'AFIO_MAPR' },
        config: { chunkSize: 20, chunkOverlap: 0, tocMinChars: 0 },
        counter,
        logger: silentLogger().logger,
      });

      expect(result.chunks.map((c) => c.unitCount)).toEqual([27]);
      expect(result.stats.oversizedChunks).toBe(1);
      expect(result.warnings).toEqual([
        'Chunk 0 of "afio" is 27 units, over the 20-unit budget with no boundary left to split on',
      ]);
    });

    it('should warn about a run with no boundary left to split on', () => {
      const { logger, lines } = silentLogger();
      const result = chunkDocument({
        documentId: 'doc',
        source: 'doc.txt',
        document: { kind: 'text', text: 'abcdefghijklmnopqrstuvwxyz' },
        config: { chunkSize: 10, chunkOverlap: 0, tocMinChars: 0 },
        counter,
        logger,
      });

      const message =
        'Chunk 0 of "doc" is 26 units, over the 10-unit budget with no boundary left to split on';
      expect(result.chunks).toHaveLength(1);
      expect(result.stats.oversizedChunks).toBe(1);
      expect(result.warnings).toEqual([message]);
      expect(lines).toEqual([`WARN  ${message} {"section":"(preamble)"}`]);
    });
  });

  describe('overlap', () => {
    it('should stitch neighbour bodies across chunk boundaries', () => {
      const result = chunkDocument({
        documentId: 'ov',
        source: 'ov.txt',
        document: { kind: 'text', text: 'aaaa aaaa\n\nbbbb bbbb\n\ncccc cccc' },
        config: { chunkSize: 10, chunkOverlap: 8, tocMinChars: 0 },
        counter,
      });

      expect(result.chunks.map((c) => c.text)).toEqual([
        'aaaa aaaa\n\nbbbb [...]',
        '[...] aaaa\n\nbbbb bbbb\n\ncccc [...]',
        '[...] bbbb\n\ncccc cccc',
      ]);
      expect(result.chunks[0]?.hasOverlapBefore).toBe(false);
      expect(result.chunks[1]?.hasOverlapBefore).toBe(true);
      expect(result.chunks[2]?.hasOverlapAfter).toBe(false);
    });
  });

  describe('page-scoped input', () => {
    const result = chunkDocument({
      documentId: 'ds',
      source: 'ds.pdf',
      document: {
        kind: 'pages',
        pages: [
          { pageNumber: 1, text: 'Clock control text describing the RCC_CR register and its ready flags.\nSTM32 manual 1' },
          { pageNumber: 2, text: 'GPIO text describing port configuration in considerable detail here.\nSTM32 manual 2' },
          { pageNumber: 3, text: '\nSTM32 manual 3' },
        ],
      },
      counter,
    });

    it('should emit one chunk per non-empty page with its page number', () => {
      expect(result.chunks.map((c) => c.page)).toEqual([1, 2]);
      expect(result.chunks.map((c) => c.section)).toEqual([undefined, undefined]);
    });

    it('should strip running footers', () => {
      expect(result.chunks[0]?.body).toBe(
        'Clock control text describing the RCC_CR register and its ready flags.'
      );
      expect(result.chunks.some((c) => c.text.includes('STM32 manual'))).toBe(false);
    });

    it('should annotate regular chunks with their identifiers', () => {
      expect(result.chunks[0]?.keyTerms).toBe('[KEY: RCC_CR]');
      expect(result.chunks[1]?.keyTerms).toBeUndefined();
    });
  });

  it('should be deterministic', () => {
    const run = () =>
      chunkDocument({
        documentId: 'rm0008',
        source: 'rm0008.md',
        document: { kind: 'text', text: MANUAL },
        counter,
      }).chunks;

    expect(run()).toEqual(run());
  });

  it('should return no chunks for an empty document', () => {
    const result = chunkDocument({
      documentId: 'empty',
      source: 'empty.txt',
      document: { kind: 'text', text: '   \n\n' },
      counter,
    });

    expect(result.chunks).toEqual([]);
    expect(result.stats.chunkCount).toBe(0);
  });
});

/**
 * Unit Tests for the structural classifier
 */

import { describe, it, expect } from 'vitest';
import {
  ChunkKind,
  annotate,
  classifyChunk,
  findBitFieldNames,
  hasTabularStructure,
  resolveRegisterName,
} from '../../lib/src/chunking/index.js';

const AFIO_MAPR_TABLE = [
  '### AF remap and debug I/O configuration register (AFIO_MAPR)',
  'Address offset: 0x04',
  'Reset value: 0x0000 0000',
  '| Bits | Field | Description |',
  '|------|-------|-------------|',
  '| 31:27 | Reserved | Must be kept at reset value |',
  'Bits 26:24 SWJ_CFG[2:0]: Serial wire JTAG configuration',
  'Bit 2 USART1_REMAP: USART1 remapping',
].join('\n');

describe('hasTabularStructure', () => {
  it('should detect a markdown separator row', () => {
    expect(hasTabularStructure('| a | b |\n|---|:---:|\n| 1 | 2 |')).toBe(true);
  });

  it('should detect three consecutive rows with matching delimiters', () => {
    expect(hasTabularStructure('a | b | c\nd | e | f\ng | h | i')).toBe(true);
  });

  it('should reject two rows or uneven rows', () => {
    expect(hasTabularStructure('a | b | c\nd | e | f')).toBe(false);
    expect(hasTabularStructure('a | b | c\nd | e\ng | h | i')).toBe(false);
  });
});

describe('findBitFieldNames', () => {
  it('should read field names with or without bit ranges', () => {
    expect(findBitFieldNames(AFIO_MAPR_TABLE, 8)).toEqual(['SWJ_CFG', 'USART1_REMAP']);
  });

  it('should respect the limit', () => {
    expect(findBitFieldNames(AFIO_MAPR_TABLE, 1)).toEqual(['SWJ_CFG']);
  });
});

describe('resolveRegisterName', () => {
  it('should prefer the nearest heading that names a register', () => {
    const text = '## GPIOx_CRL\n\n### AFIO_MAPR\nAddress offset: 0x04';
    expect(resolveRegisterName(text, text.indexOf('Address'))).toBe('AFIO_MAPR');
  });

  it('should fall back to the section heading, then the text', () => {
    expect(resolveRegisterName('Address offset: 0x08', 0, 'GPIOx_CRH register')).toBe('GPIOx_CRH');
    expect(resolveRegisterName('Address offset: 0x08 of RCC_CR', 0, 'Control')).toBe('RCC_CR');
    expect(resolveRegisterName('Address offset: 0x08', 0, 'Control register')).toBe('Control register');
    expect(resolveRegisterName('Address offset: 0x08', 0)).toBe('UNKNOWN');
  });
});

describe('classifyChunk', () => {
  it('should classify a bit-field table with an offset as a register definition', () => {
    const annotation = classifyChunk(AFIO_MAPR_TABLE);

    expect(annotation.kind).toBe(ChunkKind.REGISTER_DEFINITION);
    expect(annotation.registerName).toBe('AFIO_MAPR');
    expect(annotation.title).toBe(
      'REGISTER DEFINITION: AFIO_MAPR - Complete bit field specification'
    );
    expect(annotation.keyTerms).toBe(
      '[KEY: TABLE:register_bitfields | AFIO_MAPR | offset:0x04 | reset:0x0000 | fields:SWJ_CFG,USART1_REMAP]'
    );
  });

  it('should not treat an offset without a table as a definition', () => {
    const annotation = classifyChunk('The AFIO_MAPR register. Address offset: 0x04');

    expect(annotation.kind).toBe(ChunkKind.REGULAR);
    expect(annotation.title).toBeUndefined();
    expect(annotation.keyTermList).toEqual(['AFIO_MAPR', 'offset:0x04']);
  });

  it('should classify register lists as overviews without naming registers', () => {
    const annotation = classifyChunk(
      'Registers AFIO_EVCR, AFIO_MAPR, AFIO_EXTICR1 and AFIO_EXTICR2 are listed.'
    );

    expect(annotation.kind).toBe(ChunkKind.OVERVIEW);
    expect(annotation.title).toBeUndefined();
    expect(annotation.keyTerms).toBe('[KEY: OVERVIEW:register_list]');
  });

  it('should honour the overview threshold option', () => {
    const annotation = classifyChunk('AFIO_EVCR and AFIO_MAPR', {}, { overviewMinIdentifiers: 2 });
    expect(annotation.kind).toBe(ChunkKind.OVERVIEW);
  });

  it('should cap identifiers in regular key terms', () => {
    const annotation = classifyChunk('A_1 BB_1 CC_2 DD_3', {}, { maxKeyIdentifiers: 2, overviewMinIdentifiers: 10 });
    expect(annotation.keyTermList).toEqual(['BB_1', 'CC_2']);
  });

  it('should leave plain prose unannotated', () => {
    const annotation = classifyChunk('Plain prose about clocks.');

    expect(annotation).toEqual({ kind: ChunkKind.REGULAR, keyTermList: [] });
    expect(annotate('Plain prose about clocks.', annotation)).toBe('Plain prose about clocks.');
  });
});

describe('annotate', () => {
  it('should write title and key terms above the body', () => {
    const annotation = classifyChunk(AFIO_MAPR_TABLE);
    const text = annotate(AFIO_MAPR_TABLE, annotation);

    expect(text.split('\n').slice(0, 3)).toEqual([
      'REGISTER DEFINITION: AFIO_MAPR - Complete bit field specification',
      '[KEY: TABLE:register_bitfields | AFIO_MAPR | offset:0x04 | reset:0x0000 | fields:SWJ_CFG,USART1_REMAP]',
      '',
    ]);
    expect(text.endsWith(AFIO_MAPR_TABLE)).toBe(true);
  });
});

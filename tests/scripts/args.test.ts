/**
 * Tests for CLI argument parsing
 */

import { describe, it, expect } from 'vitest';

import { CliUsageError, parseCliArgs, parseFilterValue, parseKeyValue } from '../../scripts/src/args.js';

describe('parseCliArgs', () => {
  it('should parse a search with every option', () => {
    const args = parseCliArgs([
      'search',
      'rm0008',
      'AFIO_MAPR SWJ_CFG',
      '--top-k',
      '3',
      '--filter',
      'page=278',
      '--filter=source=rm0008.pdf',
      '--rerank-local',
      '--keyword-boost',
      '--verbose',
    ]);

    expect(args).toEqual({
      verbose: true,
      quiet: false,
      logFormat: 'pretty',
      cli: {
        command: 'search',
        database: 'rm0008',
        query: 'AFIO_MAPR SWJ_CFG',
        topK: 3,
        filter: { page: 278, source: 'rm0008.pdf' },
        rerank: 'local',
        keywordBoost: true,
      },
    });
  });

  it('should leave optional search settings unset', () => {
    expect(parseCliArgs(['search', 'rm0008', 'DMA priority']).cli).toEqual({
      command: 'search',
      database: 'rm0008',
      query: 'DMA priority',
      filter: {},
      keywordBoost: false,
    });
  });

  it('should map the rerank switches to backends', () => {
    const backend = (flag: string) => {
      const { cli } = parseCliArgs(['search', 'db', 'q', flag]);
      return cli.command === 'search' ? cli.rerank : undefined;
    };

    expect(backend('--rerank')).toBe('cohere');
    expect(backend('--rerank-bge')).toBe('bge');
  });

  it('should refuse two rerank backends at once', () => {
    expect(() => parseCliArgs(['search', 'db', 'q', '--rerank', '--rerank-bge'])).toThrow(
      'Choose one of --rerank, --rerank-local or --rerank-bge'
    );
  });

  it('should collect ingest paths and string metadata', () => {
    expect(
      parseCliArgs(['ingest', 'rm0008', 'a.pdf', 'b.md', '--meta', 'family=f1', '--meta', 'rev=21']).cli
    ).toEqual({
      command: 'ingest',
      database: 'rm0008',
      paths: ['a.pdf', 'b.md'],
      metadata: { family: 'f1', rev: '21' },
    });
  });

  it('should accept a document id for a single file only', () => {
    expect(parseCliArgs(['ingest', 'db', 'a.pdf', '--document-id', 'rm0008-r21']).cli).toMatchObject({
      documentId: 'rm0008-r21',
    });
    expect(() => parseCliArgs(['ingest', 'db', 'a.pdf', 'b.pdf', '--document-id', 'x'])).toThrow(
      '--document-id can only be used with a single file'
    );
  });

  it('should parse the database commands', () => {
    expect(parseCliArgs(['create-db', 'rm0008']).cli).toEqual({ command: 'create-db', database: 'rm0008' });
    expect(parseCliArgs(['list-dbs']).cli).toEqual({ command: 'list-dbs' });
    expect(parseCliArgs(['delete-doc', 'rm0008', 'rm0008-r21']).cli).toEqual({
      command: 'delete-doc',
      database: 'rm0008',
      documentId: 'rm0008-r21',
    });
  });

  it('should return help for no command or a help flag', () => {
    expect(parseCliArgs([]).cli).toEqual({ command: 'help' });
    expect(parseCliArgs(['search', '-h']).cli).toEqual({ command: 'help' });
  });

  it('should apply the global logging flags', () => {
    const args = parseCliArgs(['list-dbs', '--quiet', '--log-format=json']);

    expect(args.quiet).toBe(true);
    expect(args.logFormat).toBe('json');
  });

  it('should reject usage errors', () => {
    expect(() => parseCliArgs(['frobnicate'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['create-db'])).toThrow('Usage: create-db <name>');
    expect(() => parseCliArgs(['list-docs', 'db', '--keyword-boost'])).toThrow(
      'Unknown option --keyword-boost for list-docs'
    );
    expect(() => parseCliArgs(['search', 'db', 'q', '--top-k', '0'])).toThrow(
      '--top-k expects a positive integer, got "0"'
    );
    expect(() => parseCliArgs(['search', 'db', 'q', '--top-k'])).toThrow('--top-k requires a value');
    expect(() => parseCliArgs(['list-dbs', '--log-format=xml'])).toThrow(CliUsageError);
  });
});

describe('parseKeyValue', () => {
  it('should split on the first equals sign', () => {
    expect(parseKeyValue('note=a=b', '--meta')).toEqual(['note', 'a=b']);
  });

  it('should reject a missing key', () => {
    expect(() => parseKeyValue('=x', '--filter')).toThrow('--filter expects key=value, got "=x"');
  });
});

describe('parseFilterValue', () => {
  it('should turn integers into numbers and keep other text', () => {
    expect(parseFilterValue('12')).toBe(12);
    expect(parseFilterValue('-3')).toBe(-3);
    expect(parseFilterValue('0x1C')).toBe('0x1C');
    expect(parseFilterValue('1.5')).toBe('1.5');
  });
});

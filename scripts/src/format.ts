/**
 * Console output for the techdoc-rag CLI
 */

import {
  formatProgress,
  type DatabaseInfo,
  type DocumentSummary,
  type IngestProgressEvent,
  type IngestResult,
  type ProgressEntry,
  type SearchResponse,
  type SearchResult,
} from '@techdoc-rag/lib';

const SECTION_LABEL_LENGTH = 30;

/**
 * Page when the chunk has one, else a shortened section heading
 */
export function formatLocation(result: Pick<SearchResult, 'page' | 'section'>): string {
  if (result.page !== undefined) {
    return `Page: ${result.page}`;
  }
  if (result.section) {
    return `Section: ${result.section.slice(0, SECTION_LABEL_LENGTH)}`;
  }
  return '';
}

/**
 * Two lines: rank, score and location, then the quoted snippet
 */
export function formatSearchResult(result: SearchResult): string {
  const header = [`[${result.rank}] Score: ${result.score.toFixed(2)}`, `Source: ${result.source}`];
  const location = formatLocation(result);
  if (location) {
    header.push(location);
  }
  const collapsed = result.text.replace(/\s+/g, ' ').trim();
  const ellipsis = collapsed.length > result.snippet.length ? '...' : '';
  return `${header.join(' | ')}\n    "${result.snippet}${ellipsis}"`;
}

export function formatSearchResponse(response: SearchResponse): string[] {
  const lines: string[] = [];
  for (const degradation of response.degradations) {
    lines.push(`Warning: reranking disabled (${degradation.backend}): ${degradation.message}`);
  }
  if (response.results.length === 0) {
    lines.push('No results found.');
    return lines;
  }

  lines.push('', `Search results for: "${response.query}"`, '');
  for (const result of response.results) {
    lines.push(formatSearchResult(result), '');
  }
  lines.push(`Search time: ${response.durationMs}ms`);
  return lines;
}

export function formatDatabases(databases: readonly DatabaseInfo[]): string[] {
  if (databases.length === 0) {
    return ['No databases found.'];
  }
  return ['Available databases:', ...databases.map((db) => `  - ${db.name} (${db.pointCount} chunks)`)];
}

export function formatDocuments(database: string, documents: readonly DocumentSummary[]): string[] {
  if (documents.length === 0) {
    return [`No documents in database '${database}'.`];
  }
  return [
    `Documents in '${database}':`,
    ...documents.map((doc) => `  - ${doc.documentId} (${doc.source}, ${doc.chunkCount} chunks)`),
  ];
}

export function formatIngestResult(database: string, result: IngestResult): string {
  if (result.status === 'no_content') {
    return `  No text found in ${result.source}; nothing added to '${database}'`;
  }
  const replaced = result.chunksReplaced > 0 ? `, replaced ${result.chunksReplaced}` : '';
  return `  Added ${result.chunksWritten} chunks to database '${database}' as ${result.documentId}${replaced}`;
}

export function formatEmbeddingProgress(
  event: Extract<IngestProgressEvent, { stage: 'embedding' }>
): string {
  return `  Embedding batch ${event.batch}/${event.totalBatches}... (${event.chunksEmbedded}/${event.totalChunks} chunks)`;
}

/**
 * Files done so far; printed only for multi-file runs
 */
export function formatFileProgress(entry: ProgressEntry): string {
  return `Files: ${formatProgress(entry)}`;
}

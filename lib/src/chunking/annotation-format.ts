/**
 * Annotation Format
 *
 * The textual layout of titles, key-term lines and overlap markers written
 * at ingestion time, and the parser the keyword-boost stage uses to read
 * them back at query time. Both sides go through this module only.
 */

// =============================================================================
// Identifiers
// =============================================================================

/**
 * Register-like identifier: two or more capitals, optional digits, an
 * optional `x` placeholder, then an underscore suffix (AFIO_MAPR, GPIOx_CRL,
 * TIM1_CCR2, USART_BRR). `\b` on both sides keeps AFIO_MAPR out of AFIO_MAPR2.
 */
export const REGISTER_IDENTIFIER_SOURCE = '\\b[A-Z]{2,}[0-9]*x?_[A-Z0-9_]+\\b';

export function registerIdentifierPattern(): RegExp {
  return new RegExp(REGISTER_IDENTIFIER_SOURCE, 'g');
}

/**
 * Distinct identifiers in order of first appearance
 */
export function findRegisterIdentifiers(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(registerIdentifierPattern())) {
    seen.add(match[0]);
  }
  return [...seen];
}

// =============================================================================
// Rendering
// =============================================================================

export const TITLE_PREFIX = 'REGISTER DEFINITION:';
export const TITLE_SUFFIX = ' - Complete bit field specification';
export const KEY_PREFIX = '[KEY: ';
export const KEY_SEPARATOR = ' | ';
export const TABLE_MARKER = 'TABLE:register_bitfields';
export const OVERVIEW_MARKER = 'OVERVIEW:register_list';
export const OVERLAP_MARKER = '[...]';

export function formatTitle(registerName: string): string {
  return `${TITLE_PREFIX} ${registerName}${TITLE_SUFFIX}`;
}

export function formatKeyTerms(terms: readonly string[]): string {
  return `${KEY_PREFIX}${terms.join(KEY_SEPARATOR)}]`;
}

/**
 * Prepend title and key-term line to a body: `title\n[KEY: …]\n\nbody`
 */
export function renderAnnotatedText(
  body: string,
  title: string | undefined,
  keyTerms: string | undefined
): string {
  const header = [title, keyTerms].filter((part): part is string => Boolean(part));
  return header.length > 0 ? `${header.join('\n')}\n\n${body}` : body;
}

export function formatLeadingOverlap(text: string): string {
  return `${OVERLAP_MARKER} ${text}`;
}

export function formatTrailingOverlap(text: string): string {
  return `${text} ${OVERLAP_MARKER}`;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Stored chunk text split into the regions the keyword boost scores
 */
export interface AnnotatedRegions {
  title: string;
  keyTerms: string;
  /** Everything else, overlap included */
  body: string;
}

const TITLE_LINE = /^REGISTER DEFINITION:.*$/m;
const KEY_LINE = /^\[KEY: .*\]$/m;

export function parseAnnotatedRegions(text: string): AnnotatedRegions {
  let rest = text;
  let title = '';
  let keyTerms = '';

  const titleMatch = TITLE_LINE.exec(rest);
  if (titleMatch) {
    title = titleMatch[0];
    rest = rest.slice(0, titleMatch.index) + rest.slice(titleMatch.index + title.length);
  }
  const keyMatch = KEY_LINE.exec(rest);
  if (keyMatch) {
    keyTerms = keyMatch[0];
    rest = rest.slice(0, keyMatch.index) + rest.slice(keyMatch.index + keyTerms.length);
  }

  return { title, keyTerms, body: rest };
}

/**
 * TOC Filter
 *
 * Drops sections that are table-of-contents noise: once dot leaders and page
 * numbers are stripped, almost nothing is left.
 */

import type { Section } from './types.js';

/** Filler run ending in a page number: `Clock tree ........ 91` */
const DOT_LEADER = /[.·…_][\s.·…_]+\d+\s*$/;
/** A line holding nothing but a page number */
const BARE_PAGE_NUMBER = /^\s*\d+\s*$/;

/**
 * Section content with TOC artefacts removed from every line
 */
export function stripTocArtifacts(lines: readonly string[]): string {
  return lines
    .map((line) => (BARE_PAGE_NUMBER.test(line) ? '' : line.replace(DOT_LEADER, '')))
    .join('\n')
    .trim();
}

export function isTableOfContents(section: Section, minChars = 50): boolean {
  return stripTocArtifacts(section.body).length < minChars;
}

export interface TocFilterResult {
  kept: Section[];
  dropped: Section[];
}

export function filterTableOfContents(
  sections: readonly Section[],
  minChars = 50
): TocFilterResult {
  const kept: Section[] = [];
  const dropped: Section[] = [];
  for (const section of sections) {
    (isTableOfContents(section, minChars) ? dropped : kept).push(section);
  }
  return { kept, dropped };
}

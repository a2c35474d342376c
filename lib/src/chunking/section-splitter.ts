/**
 * Section Splitter
 *
 * Divides normalized text into heading-scoped sections (Markdown `#`..`####`)
 * or page-scoped sections for text extracted page by page.
 */

import { createSectionPath, type PageText, type Section } from './types.js';

const HEADING_PATTERN = /^(#{1,4})\s+(.+)$/;

interface OpenSection {
  heading: string;
  level: number;
  body: string[];
  sectionPath: string;
}

/**
 * Split heading-structured text into sections.
 *
 * Content before the first heading becomes a section with an empty heading.
 * A heading immediately followed by another heading yields no section.
 */
export function splitSections(text: string, documentId: string): Section[] {
  const sections: Section[] = [];
  // headingStack[level - 1] is the open heading at that depth
  const headingStack: string[] = [];
  let current: OpenSection = { heading: '', level: 0, body: [], sectionPath: '' };

  const flush = (): void => {
    if (current.body.length > 0) {
      sections.push(
        Object.freeze({
          documentId,
          heading: current.heading,
          level: current.level,
          body: Object.freeze([...current.body]),
          ...(current.sectionPath ? { sectionPath: current.sectionPath } : {}),
        })
      );
    }
  };

  for (const line of text.split('\n')) {
    const match = HEADING_PATTERN.exec(line);
    if (match?.[1] && match[2]) {
      flush();
      const level = match[1].length;
      const heading = match[2].trim();
      headingStack.length = level - 1;
      headingStack[level - 1] = heading;
      current = {
        heading,
        level,
        body: [],
        sectionPath: createSectionPath(headingStack),
      };
    } else {
      current.body.push(line);
    }
  }
  flush();

  return sections;
}

/**
 * One section per physical page. Empty pages yield no section.
 */
export function splitPages(pages: readonly PageText[], documentId: string): Section[] {
  return pages
    .filter((page) => page.text.trim().length > 0)
    .map((page) =>
      Object.freeze({
        documentId,
        heading: '',
        level: 0,
        body: Object.freeze(page.text.split('\n')),
        pageNumber: page.pageNumber,
      })
    );
}

export function sectionContent(section: Section): string {
  return section.body.join('\n').trim();
}

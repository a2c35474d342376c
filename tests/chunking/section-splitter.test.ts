/**
 * Unit Tests for the section splitter
 */

import { describe, it, expect } from 'vitest';
import { sectionContent, splitPages, splitSections } from '../../lib/src/chunking/index.js';

const MANUAL = [
  'Preamble line',
  '# 9 GPIO',
  'Intro',
  '## 9.4 AFIO registers',
  '### 9.4.2 AFIO_MAPR',
  'Body A',
  '##### not a heading',
  '## 9.5 Next',
  'Body B',
].join('\n');

describe('splitSections', () => {
  const sections = splitSections(MANUAL, 'rm');

  it('should emit one section per heading with a body', () => {
    expect(sections.map((s) => s.heading)).toEqual(['', '9 GPIO', '9.4.2 AFIO_MAPR', '9.5 Next']);
    expect(sections.map((s) => s.level)).toEqual([0, 1, 3, 2]);
  });

  it('should keep content before the first heading as a preamble', () => {
    expect(sections[0]?.body).toEqual(['Preamble line']);
    expect(sections[0]?.sectionPath).toBeUndefined();
  });

  it('should treat deeper markers as body text', () => {
    expect(sections[2]?.body).toEqual(['Body A', '##### not a heading']);
  });

  it('should build section paths from the heading stack', () => {
    expect(sections[2]?.sectionPath).toBe('9 GPIO > 9.4 AFIO registers > 9.4.2 AFIO_MAPR');
    expect(sections[3]?.sectionPath).toBe('9 GPIO > 9.5 Next');
  });

  it('should freeze sections', () => {
    expect(Object.isFrozen(sections[1])).toBe(true);
    expect(Object.isFrozen(sections[1]?.body)).toBe(true);
  });

  it('should attach the document id', () => {
    expect(sections.every((s) => s.documentId === 'rm')).toBe(true);
  });
});

describe('splitPages', () => {
  it('should emit one section per non-empty page', () => {
    const sections = splitPages(
      [
        { pageNumber: 1, text: 'a\nb' },
        { pageNumber: 2, text: '   ' },
        { pageNumber: 3, text: 'c' },
      ],
      'ds'
    );

    expect(sections).toHaveLength(2);
    expect(sections[0]).toEqual({ documentId: 'ds', heading: '', level: 0, body: ['a', 'b'], pageNumber: 1 });
    expect(sections[1]?.pageNumber).toBe(3);
  });
});

describe('sectionContent', () => {
  it('should join and trim body lines', () => {
    const [section] = splitSections('# H\n\nline one\nline two\n', 'd');
    expect(section ? sectionContent(section) : null).toBe('line one\nline two');
  });
});

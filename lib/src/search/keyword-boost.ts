/**
 * Keyword Boost
 *
 * Lexical tie-breaking for register lookups. Each query identifier found in
 * a candidate adds the boost of the most prominent region it appears in:
 * the register-definition title, the key-term line, or the body.
 */

import { findRegisterIdentifiers, parseAnnotatedRegions, type AnnotatedRegions } from '../chunking/annotation-format.js';
import type { BoostTiers } from '../config/types.js';
import { compareCandidates, type Candidate } from './types.js';

export type BoostRegion = keyof AnnotatedRegions;

/**
 * Distinct identifiers in the upper-cased query, in order of appearance
 */
export function extractQueryIdentifiers(query: string): string[] {
  return findRegisterIdentifiers(query.toUpperCase());
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-identifier, case-insensitive matcher. AFIO_MAPR does not match
 * inside AFIO_MAPR2 or XAFIO_MAPR.
 */
export function identifierMatcher(term: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(term)}\\b`, 'i');
}

/**
 * Highest-priority region containing the term, if any
 */
export function findBoostRegion(regions: AnnotatedRegions, matcher: RegExp): BoostRegion | null {
  if (matcher.test(regions.title)) {
    return 'title';
  }
  if (matcher.test(regions.keyTerms)) {
    return 'keyTerms';
  }
  if (matcher.test(regions.body)) {
    return 'body';
  }
  return null;
}

export interface KeywordBoostResult {
  candidates: Candidate[];
  terms: string[];
  status: 'applied' | 'no_terms';
}

/**
 * Add boosts and re-sort by (score desc, originalRank asc). Scores are not
 * capped. Input candidates are not modified.
 */
export function applyKeywordBoost(
  candidates: readonly Candidate[],
  query: string,
  boosts: BoostTiers
): KeywordBoostResult {
  const terms = extractQueryIdentifiers(query);
  if (terms.length === 0) {
    return { candidates: [...candidates], terms, status: 'no_terms' };
  }
  const matchers = terms.map((term) => ({ term, matcher: identifierMatcher(term) }));

  const boosted = candidates.map((candidate) => {
    const regions = parseAnnotatedRegions(candidate.text);
    let boost = 0;
    const matchedTerms: string[] = [];

    for (const { term, matcher } of matchers) {
      const region = findBoostRegion(regions, matcher);
      if (region) {
        boost += boosts[region];
        matchedTerms.push(term);
      }
    }

    return {
      ...candidate,
      score: candidate.score + boost,
      keywordBoost: candidate.keywordBoost + boost,
      matchedTerms,
    };
  });

  return { candidates: boosted.sort(compareCandidates), terms, status: 'applied' };
}

/**
 * Candidate ranking
 *
 * Implements scoring formula:
 * score = price − rating × RATING_VALUE
 *
 * Lower score ranks first, so cheaper and better-rated offers are favoured.
 * Ties are broken by providerId, then offerId, so equal inputs always yield
 * the same order.
 */

import type { Candidate } from '../types/booking.js';

export interface ScoringConstants {
  /** Currency units one rating star is worth */
  RATING_VALUE: number;
}

export const DEFAULT_SCORING_CONSTANTS: ScoringConstants = {
  RATING_VALUE: 1000,
};

export interface ScoredCandidate {
  candidate: Candidate;
  score: number;
}

export interface CandidateFilter {
  excluded?: readonly string[];
  budget?: number | null;
}

export function scoreCandidate(candidate: Candidate, constants: ScoringConstants): number {
  return candidate.price - candidate.rating * constants.RATING_VALUE;
}

export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) {
    return a.score - b.score;
  }
  if (a.candidate.providerId !== b.candidate.providerId) {
    return a.candidate.providerId < b.candidate.providerId ? -1 : 1;
  }
  if (a.candidate.offerId !== b.candidate.offerId) {
    return a.candidate.offerId < b.candidate.offerId ? -1 : 1;
  }
  return 0;
}

/**
 * Drop candidates that cannot be offered: unavailable, excluded, or over budget
 */
export function filterCandidates(candidates: Candidate[], filter: CandidateFilter): Candidate[] {
  const excluded = new Set(filter.excluded ?? []);
  return candidates.filter((candidate) => {
    if (!candidate.available || excluded.has(candidate.offerId)) {
      return false;
    }
    if (filter.budget !== undefined && filter.budget !== null && candidate.price > filter.budget) {
      return false;
    }
    return true;
  });
}

/**
 * Main ranking function: filters, scores and orders candidates
 */
export function rankCandidates(
  candidates: Candidate[],
  filter: CandidateFilter = {},
  constants: ScoringConstants = DEFAULT_SCORING_CONSTANTS
): ScoredCandidate[] {
  return filterCandidates(candidates, filter)
    .map((candidate) => ({ candidate, score: scoreCandidate(candidate, constants) }))
    .sort(compareScored);
}

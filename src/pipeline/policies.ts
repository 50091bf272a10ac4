import { inferExpectedMediaType } from '../utils/normalize.js';
import type { CandidatePolicyName } from '../config.js';
import type { MediaCandidate } from '../types.js';

/**
 * Picks one candidate out of a non-empty list of search candidates.
 */
export type CandidateSelectionPolicy = (candidates: MediaCandidate[], query: string) => MediaCandidate;

/**
 * Picks the seasons to request out of a non-empty list of regular (non-zero)
 * season numbers, when the caller did not ask for all seasons.
 */
export type SeasonSelectionPolicy = (seasonNumbers: number[]) => number[];

// Trust the service's ranking
export const firstResult: CandidateSelectionPolicy = (candidates) => candidates[0];

/**
 * Prefers the first TV candidate when the spoken title names a season
 * ("Severance Season 2"), otherwise the first candidate.
 */
export const preferHintedType: CandidateSelectionPolicy = (candidates, query) => {
  if (inferExpectedMediaType(query) === 'tv') {
    const tv = candidates.find(c => c.mediaType === 'tv');
    if (tv) return tv;
  }
  return candidates[0];
};

export const latestSeason: SeasonSelectionPolicy = (seasonNumbers) => [Math.max(...seasonNumbers)];

export const candidatePolicies: Record<CandidatePolicyName, CandidateSelectionPolicy> = {
  first: firstResult,
  'prefer-hinted-type': preferHintedType,
};

import type { OverseerrApi } from '../client.js';
import { firstResult, type CandidateSelectionPolicy } from './policies.js';
import type { MediaCandidate, SearchResultItem } from '../types.js';

function toCandidate(item: SearchResultItem): MediaCandidate | null {
  // Search also returns people; only movies and shows can be requested
  if (item.mediaType !== 'movie' && item.mediaType !== 'tv') {
    return null;
  }
  return {
    id: item.id,
    mediaType: item.mediaType,
    displayTitle: (item.mediaType === 'tv' ? item.name : item.title) || item.title || item.name || '',
  };
}

export class MediaResolver {
  constructor(
    private api: OverseerrApi,
    private policy: CandidateSelectionPolicy = firstResult
  ) {}

  /**
   * Searches for the spoken title. Returns null when nothing requestable matched.
   */
  async resolve(query: string): Promise<MediaCandidate | null> {
    const result = await this.api.search(query);
    const candidates = (result.results || [])
      .map(toCandidate)
      .filter((c): c is MediaCandidate => c !== null);

    if (candidates.length === 0) {
      return null;
    }
    return this.policy(candidates, query);
  }
}
